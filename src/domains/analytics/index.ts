// ──────────────────────────────────────────
// Analytics domain — barrel export
// ──────────────────────────────────────────

export { AggregationEngine } from './aggregation.engine';
export { AnalyticsFacade } from './analytics.facade';
export { QueryCache } from './cache/query-cache';
export { MemoryCacheStore } from './cache/memory.store';
export { KnexCacheStore } from './cache/knex.store';
export { createAnalyticsRoutes } from './routes';
