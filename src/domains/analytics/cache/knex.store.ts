// ──────────────────────────────────────────
// Analytics: Postgres-backed cache store
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { CacheStore } from '../../../shared/contracts';

const TABLE = 'query_cache';

export class KnexCacheStore implements CacheStore {
  constructor(private db: Knex) {}

  async exists(key: string): Promise<boolean> {
    const row = await this.live(key).first('cache_key');
    return row !== undefined;
  }

  async get(key: string): Promise<string | null> {
    const row: { value: string } | undefined = await this.live(key).first('value');
    return row?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const expiresAt = new Date(Date.now() + ttlSeconds * 1000);
    await this.db.raw(
      `${this.db(TABLE).insert({ cache_key: key, value, expires_at: expiresAt }).toString()}
       ON CONFLICT (cache_key)
       DO UPDATE SET
         value = EXCLUDED.value,
         expires_at = EXCLUDED.expires_at`
    );
  }

  private live(key: string): Knex.QueryBuilder {
    return this.db(TABLE).where('cache_key', key).where('expires_at', '>', new Date());
  }
}
