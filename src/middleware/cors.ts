import cors from 'cors';
import { logger } from '../utils/logger';

// Static allowed origins
const staticAllowedOrigins = [
  'http://localhost:3000',
];

/**
 * CORS middleware for the configured origins.
 * With no origins configured every origin is allowed; development also allows any localhost port.
 */
export function createCors(allowedOrigins: readonly string[], nodeEnv: string) {
  const allowAll = allowedOrigins.length === 0;

  return cors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin || allowAll) {
        return callback(null, true);
      }

      if (staticAllowedOrigins.includes(origin) || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }

      if (nodeEnv === 'development' && (origin.includes('localhost') || origin.includes('127.0.0.1'))) {
        return callback(null, true);
      }

      logger.warn('CORS blocked origin', { origin });
      callback(null, false);
    },
    credentials: false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });
}
