// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { Knex } from 'knex';
import { loadConfig, AppConfig } from './config';
import { getDb, closeDb, migrateLatest } from './db/connection';
import { CacheStore } from './shared/contracts';

// Ledger
import { SalesRepo } from './domains/ledger/sales.repo';

// Analytics
import {
  AggregationEngine,
  AnalyticsFacade,
  QueryCache,
  MemoryCacheStore,
  KnexCacheStore,
  createAnalyticsRoutes,
} from './domains/analytics';

// Ingestion
import { IngestionService, createIngestionRoutes } from './domains/ingestion';

export function createCacheStore(config: AppConfig, db: Knex): CacheStore {
  return config.cache.backend === 'memory' ? new MemoryCacheStore() : new KnexCacheStore(db);
}

async function main() {
  const config = loadConfig();
  const db = getDb(config.databaseUrl);
  await migrateLatest(db);

  // ── Ledger ──
  const salesRepo = new SalesRepo(db);

  // ── Cache ──
  const queryCache = new QueryCache(createCacheStore(config, db), {
    analysisTtlSeconds: config.cache.analysisTtlSeconds,
    ingestionTtlSeconds: config.cache.ingestionTtlSeconds,
  });

  // ── Domains ──
  const engine = new AggregationEngine(salesRepo);
  const analytics = new AnalyticsFacade(engine, queryCache);
  const ingestionService = new IngestionService(salesRepo, queryCache);

  // ── Express app ──
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.use('/api/v1/sales', createIngestionRoutes(ingestionService));
  app.use('/api/v1/analytics', createAnalyticsRoutes(analytics));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const server = app.listen(config.port, () => {
    console.log(`[App] Sales analytics listening on port ${config.port} (cache: ${config.cache.backend})`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[App] Shutting down...');
    server.close();
    closeDb()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[App] Error closing database:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[App] Fatal error:', err);
    process.exit(1);
  });
}
