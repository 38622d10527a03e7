import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../core/logger';
import { DomainError, ErrorFactory } from '../core/errors';

const handleZodValidationError = (error: z.ZodError, res: Response) => {
  const fieldErrors = error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return res.status(400).json({
    success: false,
    error: {
      name: 'InvalidOperationError',
      message: `Validation failed: ${fieldErrors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
      code: 'INVALID_OPERATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      details: { fieldErrors },
    },
  });
};

const handleMalformedBody = (res: Response, message: string, details?: Record<string, unknown>) => {
  return res.status(400).json({
    success: false,
    error: {
      name: 'InvalidOperationError',
      message,
      code: 'INVALID_OPERATION_ERROR',
      statusCode: 400,
      timestamp: new Date().toISOString(),
      ...(details && { details }),
    },
  });
};

interface ClientHttpError extends Error {
  status: number;
  expose: true;
  type?: unknown;
}

// Errors raised by body parsing (oversize body, bad charset) carry a 4xx status and expose: true
const isClientHttpError = (error: Error): error is ClientHttpError => {
  const status: unknown = 'status' in error ? error.status : undefined;
  const expose: unknown = 'expose' in error ? error.expose : undefined;
  return expose === true && typeof status === 'number' && status >= 400 && status < 500;
};

const handleGenericError = (error: Error, res: Response) => {
  const isDevelopment = process.env['NODE_ENV'] === 'development';
  return res.status(500).json({
    success: false,
    error: {
      name: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_SERVER_ERROR',
      statusCode: 500,
      timestamp: new Date().toISOString(),
      ...(isDevelopment && { stack: error.stack }),
    },
  });
};

export const errorHandler = (error: Error, req: Request, res: Response, _next?: NextFunction) => {
  const request = { id: req.id, method: req.method, url: req.url };

  if (error instanceof DomainError) {
    logger.warn({ req: request, code: error.code, reason: error.message }, 'Request rejected');
    return res.status(error.statusCode).json(ErrorFactory.createErrorResponse(error));
  }

  if (error instanceof z.ZodError) {
    logger.warn({ req: request, issues: error.errors.length }, 'Request failed validation');
    return handleZodValidationError(error, res);
  }

  if (error instanceof SyntaxError && 'body' in error) {
    logger.warn({ req: request }, 'Malformed JSON body');
    return handleMalformedBody(res, 'Request body is not valid JSON');
  }

  if (isClientHttpError(error)) {
    logger.warn({ req: request, status: error.status, reason: error.message }, 'Request body rejected');
    return handleMalformedBody(res, error.message, { status: error.status, type: error.type });
  }

  logger.error({ error, req: request }, 'Request error');
  return handleGenericError(error, res);
};
