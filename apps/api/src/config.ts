/**
 * Configuration
 *
 * Environment-driven settings for the repository and the HTTP server.
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const logLevelSchema = z
  .string()
  .transform((level) => level.toLowerCase())
  .pipe(z.enum(LOG_LEVELS))
  .default('info');

const configSchema = z.object({
  DB_PATH: z.string().min(1).default('./data/exercises.db'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: logLevelSchema,
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:3000'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  dbPath: string;
  poolMax: number;
  acquireTimeoutMillis: number;
  logLevel: LogLevel;
  host: string;
  port: number;
  corsOrigin: string;
}

/**
 * Parse configuration from environment variables.
 * Throws a ZodError when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.parse(env);

  return {
    dbPath: parsed.DB_PATH,
    poolMax: parsed.DB_POOL_MAX,
    acquireTimeoutMillis: parsed.DB_ACQUIRE_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
    host: parsed.HOST,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}

/**
 * Read only `LOG_LEVEL`, falling back to `info` when it is not a known level.
 * Library code logs through this so that server settings never affect it.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}
