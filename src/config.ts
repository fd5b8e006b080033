// ──────────────────────────────────────────
// Configuration — environment → typed settings
// ──────────────────────────────────────────

import { z } from 'zod';
import { DEFAULT_ANALYSIS_TTL_SECONDS, DEFAULT_INGESTION_TTL_SECONDS } from './domains/analytics/cache/query-cache';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).default('postgres://localhost:5432/sales_ledger'),
  CACHE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
  ANALYTICS_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_ANALYSIS_TTL_SECONDS),
  INGESTION_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_INGESTION_TTL_SECONDS),
});

export type CacheBackend = 'postgres' | 'memory';

export interface AppConfig {
  port: number;
  databaseUrl: string;
  cache: {
    backend: CacheBackend;
    analysisTtlSeconds: number;
    ingestionTtlSeconds: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    cache: {
      backend: e.CACHE_BACKEND,
      analysisTtlSeconds: e.ANALYTICS_CACHE_TTL_SECONDS,
      ingestionTtlSeconds: e.INGESTION_CACHE_TTL_SECONDS,
    },
  };
}
