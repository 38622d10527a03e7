import { Router } from 'express';
import { logger } from '../core/logger';
import type { DurableBackend } from '../repositories/backend.types';

export function createHealthRoutes(backend: DurableBackend): Router {
  const router = Router();

  // Basic health check
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Health check requested');
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // Liveness probe - simple check if service is running
  router.get('/liveness', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Liveness check requested');
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Readiness probe - the backend must answer a counter read
  router.get('/readiness', async (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Readiness check requested');

    try {
      const counter = await backend.readCounter();
      res.json({
        ready: true,
        timestamp: new Date().toISOString(),
        backend: backend.kind,
        lastAllocatedId: counter,
      });
    } catch (error) {
      logger.error({ error }, 'Readiness check failed');
      res.status(503).json({
        ready: false,
        error: 'Readiness check failed',
        backend: backend.kind,
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
