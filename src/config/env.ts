/**
 * ENV CONFIG
 *
 * Parses process.env once at import time. Entry points load `.env`
 * through dotenv before this module is imported.
 */

import { z } from 'zod';

const boolFromString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().min(1).default('mongodb://127.0.0.1:27017/stock_ratings?replicaSet=rs0'),

  // Upstream ratings feed
  RATINGS_API_URL: z.string().default(''),
  RATINGS_API_TOKEN: z.string().default(''),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  FETCH_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Recommendations
  RECOMMENDATION_TTL_MS: z.coerce.number().int().min(0).default(5 * 60_000),
  RECOMMENDATION_LIMIT: z.coerce.number().int().positive().default(10),

  // Jobs
  INGEST_ON_BOOT: boolFromString.default('true'),
  INGEST_CRON: z.string().optional(),
  JOB_HISTORY_LIMIT: z.coerce.number().int().positive().default(50),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${keys.join('; ')}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
