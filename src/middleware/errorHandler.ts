import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import '../types/express';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId?: string;
  };
}

/**
 * Normalize anything thrown by a route into an AppError
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new AppError('Invalid request data', {
      statusCode: 400,
      code: 'VALIDATION_ERROR',
      details: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  // Body parser failures carry an HTTP status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return new AppError(err.message, { statusCode: err.status, code: 'BAD_REQUEST' });
  }
  const message = err instanceof Error ? err.message : 'Internal Server Error';
  return new AppError(message, { statusCode: 500, isOperational: false });
}

/**
 * Centralized error handler
 * Ensures all errors are returned as valid JSON
 * Format: { ok: false, error: { code: string, message: string, details?: unknown } }
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Ensure response hasn't been sent
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  const context = {
    requestId: req.requestId,
    code: appError.code,
    path: req.path,
    method: req.method,
    statusCode: appError.statusCode,
  };

  if (appError.statusCode >= 500) {
    logger.error('Unhandled error', err, context);
  } else {
    logger.warn(appError.message, context);
  }

  // Internal messages stay in the logs outside development
  const exposeMessage = appError.isOperational || process.env.NODE_ENV === 'development';

  const body: ErrorBody = {
    ok: false,
    error: {
      code: appError.code,
      message: exposeMessage ? appError.message : 'Internal Server Error',
      ...(appError.details !== undefined && exposeMessage ? { details: appError.details } : {}),
      ...(req.requestId ? { requestId: req.requestId } : {}),
    },
  };

  res.status(appError.statusCode).json(body);
}

/**
 * 404 Not Found handler
 * Returns valid JSON response
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', { requestId: req.requestId, path: req.path });
  res.status(404).json({
    ok: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
