import 'dotenv/config';
import { z } from 'zod';

// ── Environment ──────────────────────────────────────────────────────────────

/** Optional URL; a blank value such as `DATABASE_URL=` counts as unset. */
const connectionString = () =>
  z.preprocess((value) => (value === '' ? undefined : value), z.string().url().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DATABASE_URL: connectionString(),
  REDIS_URL: connectionString(),
  ETL_PROCEDURE_NAME: z.string().min(1).default('shop_analytics_etl'),
  ETL_SCHEDULE: z.string().min(1).default('0 3 * * *'),
});

export type Env = z.infer<typeof envSchema>;

/** Parse an environment map; throws naming every invalid variable. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

export const env = loadEnv();

type ConnectionVariable = 'DATABASE_URL' | 'REDIS_URL';

/**
 * Connection strings are only needed by the commands that open a
 * connection, so they are checked on use rather than at import.
 */
export function requireEnv(name: ConnectionVariable, source: Env = env): string {
  const value = source[name];
  if (!value) {
    const example = name === 'DATABASE_URL' ? 'postgres://localhost:5432/shop' : 'redis://localhost:6379';
    throw new Error(
      `${name} environment variable is required. ` +
        `Set it to a connection string, e.g. ${example}`,
    );
  }
  return value;
}

// ── Worker settings ──────────────────────────────────────────────────────────

export const LOG_LEVEL = env.LOG_LEVEL;
export const ETL_PROCEDURE_NAME = env.ETL_PROCEDURE_NAME;
export const ETL_SCHEDULE = env.ETL_SCHEDULE;

/** Runs never overlap. */
export const WORKER_CONCURRENCY = 1;
