/**
 * Express application factory
 * CORS, rate limiting, request logging, routes and JSON error handling
 */

import express, { Express } from 'express';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { createCors } from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createHealthRouter } from './routes/health';
import { createCoursesRouter } from './routes/courses';
import { createSelectRouter } from './routes/select';
import { AirtableCourseCatalog, CourseCatalog } from './services/catalog';
import coursePicker, { CoursePicker } from './services/coursePicker';

const VERSION = '1.0.0';

export interface AppDeps {
  catalog?: CourseCatalog;
  picker?: CoursePicker;
}

export function createApp(config: AppConfig, deps: AppDeps = {}): Express {
  const app = express();

  const catalog = deps.catalog ?? (config.airtable ? AirtableCourseCatalog.fromConfig(config.airtable) : undefined);

  app.use(requestLogger);
  app.use(createCors(config.corsOrigins, config.nodeEnv));

  app.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    message: { ok: false, error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' } },
    standardHeaders: true,
    legacyHeaders: false
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use('/health', createHealthRouter({ version: VERSION, catalogConfigured: catalog !== undefined }));
  app.use('/api/courses', createCoursesRouter(catalog));
  app.use('/api/select', createSelectRouter({
    picker: deps.picker ?? coursePicker,
    catalog,
    maxSearchSteps: config.solver.maxSearchSteps,
  }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
