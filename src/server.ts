import { startServer, stopServer } from './server-control';
import { config } from './core/config';
import { logger } from './core/logger';

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(exitCode);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

startServer(config.PORT).catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Store failures are fatal: the process cannot continue safely
process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  void gracefulShutdown('uncaughtException', 1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled promise rejection, shutting down');
  void gracefulShutdown('unhandledRejection', 1);
});
