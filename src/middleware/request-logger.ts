import type { Request, Response, NextFunction } from 'express';
import { logger } from '../core/logger';

export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  logger.debug({
    method: req.method,
    url: req.url,
    requestId: req.id,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  }, 'Request started');

  res.on('finish', () => {
    logger.info({
      method: req.method,
      url: req.url,
      status: res.statusCode,
      durationMs: Date.now() - startTime,
      requestId: req.id,
      contentLength: res.get('Content-Length'),
    }, 'Request completed');
  });

  next();
};
