// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import { DateScope, Sale } from './types';

/**
 * Ledger contract — exposed to Ingestion (writes) and Analytics (reads).
 * Implementations wrap their I/O failures in LedgerError.
 */
export interface SalesLedger {
  query(scope: DateScope): Promise<Sale[]>;
  /** All-or-nothing: either every record commits or none does. */
  bulkInsert(records: Sale[]): Promise<number>;
}

/**
 * Cache backend contract — consumed by QueryCache.
 * Any rejection is treated by the caller as a miss.
 */
export interface CacheStore {
  exists(key: string): Promise<boolean>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}
