import type { Request, Response, NextFunction } from 'express';
import type { z, ZodTypeAny } from 'zod';

export const validateBody = (schema: ZodTypeAny) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      // Zod errors are mapped by the error handler
      next(error);
    }
  };
};

/**
 * Parse route params inside a handler, where the typed result is needed
 */
export function parseParams<T extends ZodTypeAny>(schema: T, req: Request): z.infer<T> {
  return schema.parse(req.params);
}
