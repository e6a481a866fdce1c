import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { DatabaseError } from 'pg';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  // Expected, client-correctable failures; ResponseHandler logs them at warn
  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  // Malformed JSON body (express.json)
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return ResponseHandler.error(res, 'Malformed JSON body', 400, { code: 'INVALID_JSON' });
  }

  // JWT errors
  if (err instanceof jwt.TokenExpiredError) {
    return ResponseHandler.unauthorized(res, 'Token expired');
  }

  if (err instanceof jwt.JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  // Database errors
  if (err instanceof DatabaseError) {
    if (err.code === '23505') { // Unique violation
      return ResponseHandler.conflict(res, 'Resource already exists', { constraint: err.constraint });
    }

    if (err.code === '23503') { // Foreign key violation
      return ResponseHandler.error(res, 'Referenced resource does not exist', 400, {
        code: 'FOREIGN_KEY_VIOLATION',
        details: { constraint: err.constraint },
      });
    }
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
    query: req.query,
  });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
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
