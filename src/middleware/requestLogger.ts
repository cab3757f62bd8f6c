import { Request, Response, NextFunction } from 'express';
import '../types/express';
import { logger } from '../utils/logger';
import { resolveRequestId } from '../utils/requestId';

/**
 * Tag each request with an id and log it once the response is sent
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.get('X-Request-Id'));
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    logger.info(`${req.method} ${req.path}`, {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration
    });
  });

  next();
}
