import express, { type Express, type Request, type Response } from 'express';
import { errorHandler } from './middleware/error-handler';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { createHealthRoutes } from './routes/health.routes';
import { createProductRoutes } from './routes/product.routes';
import type { ProductStore } from './store';

export function createApp(store: ProductStore): Express {
  const app = express();

  // Middleware
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json());

  // Routes
  app.use('/api/health', createHealthRoutes(store.backend));
  app.use('/api/products', createProductRoutes(store.service));

  // 404 handler for unknown routes
  app.use('*', (_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        name: 'NotFoundError',
        message: 'Route not found',
        code: 'NOT_FOUND',
        statusCode: 404,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // Error handling, including malformed JSON bodies
  app.use(errorHandler);

  return app;
}
