import type { Server } from 'http';
import { createApp } from './app';
import { createProductStore, type ProductStore } from './store';
import { config, getConfigSummary, validateConfig } from './core/config';
import { logger } from './core/logger';

let server: Server | null = null;
let isShuttingDown = false;

/**
 * Start the HTTP server over a store built from configuration unless one is given
 */
export async function startServer(
  port: number = config.PORT,
  store: ProductStore = createProductStore()
): Promise<Server> {
  if (server) {
    throw new Error('Server is already started');
  }

  const issues = validateConfig();
  if (issues.length > 0) {
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  // Load persisted state before accepting calls
  const lastId = await store.backend.readCounter();
  logger.info({ config: getConfigSummary(), lastId }, 'Product store opened');

  const app = createApp(store);

  return new Promise((resolve, reject) => {
    const listening = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      server = listening;
      resolve(listening);
    });

    listening.on('error', (error) => {
      logger.error({ error }, 'Server error');
      reject(error);
    });
  });
}

/**
 * Stop the server gracefully: stop accepting connections and let in-flight calls finish
 */
export async function stopServer(): Promise<void> {
  const current = server;
  if (!current || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    await new Promise<void>((resolve, reject) => {
      current.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
    server = null;
    logger.info('Server stopped');
  } finally {
    isShuttingDown = false;
  }
}

export function isServerRunning(): boolean {
  return server !== null && !isShuttingDown;
}
