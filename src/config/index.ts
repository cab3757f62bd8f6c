/**
 * Environment configuration, validated once at startup
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '../utils/errors';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());
const optionalPositiveInt = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  PORT: positiveInt(3000),
  NODE_ENV: z.preprocess(blankToUndefined, z.enum(['development', 'production', 'test']).default('development')),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()),
  CORS_ORIGIN: optionalString,
  RATE_LIMIT_WINDOW_MS: positiveInt(15 * 60 * 1000),
  RATE_LIMIT_MAX: positiveInt(100),
  AIRTABLE_TOKEN: optionalString,
  AIRTABLE_BASE_ID: optionalString,
  AIRTABLE_TABLE_NAME: z.preprocess(blankToUndefined, z.string().default('Courses')),
  AIRTABLE_VIEW: z.preprocess(blankToUndefined, z.string().default('Grid view')),
  CATALOG_CACHE_TTL_MS: positiveInt(5 * 60 * 1000),
  SOLVER_MAX_SEARCH_STEPS: optionalPositiveInt,
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env['NODE_ENV'];
  logLevel?: Env['LOG_LEVEL'];
  corsOrigins: string[];
  rateLimit: {
    windowMs: number;
    max: number;
  };
  airtable?: {
    token: string;
    baseId: string;
    tableName: string;
    view: string;
    cacheTtlMs: number;
  };
  solver: {
    maxSearchSteps?: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(issue => issue.path.join('.'));
    throw new ValidationError(`Invalid environment configuration: ${keys.join(', ')}`, parsed.error.issues);
  }

  const vars = parsed.data;
  const airtable = vars.AIRTABLE_TOKEN && vars.AIRTABLE_BASE_ID
    ? {
        token: vars.AIRTABLE_TOKEN,
        baseId: vars.AIRTABLE_BASE_ID,
        tableName: vars.AIRTABLE_TABLE_NAME,
        view: vars.AIRTABLE_VIEW,
        cacheTtlMs: vars.CATALOG_CACHE_TTL_MS,
      }
    : undefined;

  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    corsOrigins: (vars.CORS_ORIGIN || '').split(',').map(o => o.trim()).filter(o => o),
    rateLimit: {
      windowMs: vars.RATE_LIMIT_WINDOW_MS,
      max: vars.RATE_LIMIT_MAX,
    },
    airtable,
    solver: {
      maxSearchSteps: vars.SOLVER_MAX_SEARCH_STEPS,
    },
  };
}

/**
 * Load `.env` into process.env and validate it
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
