import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { OrderPlacementError } from '../modules/orders/orders.errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const errorCode = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    body: req.body,
    params: req.params,
    query: req.query,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof OrderPlacementError) {
    return ResponseHandler.error(res, err.message, err.status, {
      code: err.code,
      details: err.details,
    });
  }

  // Unique violation
  if (errorCode(err) === '23505') {
    return ResponseHandler.conflict(res, 'Resource already exists');
  }

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' && err instanceof Error ? err.stack : undefined,
  });
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
