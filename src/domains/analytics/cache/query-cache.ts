// ──────────────────────────────────────────
// Analytics: Query cache — signature-keyed, TTL-bounded, fail-open
// ──────────────────────────────────────────

import { z } from 'zod';
import { CacheStore } from '../../../shared/contracts';
import { QuerySignature, SignatureKind } from '../../../shared/types';
import { CacheUnavailableError, errorMessage } from '../../../shared/errors';
import { signatureKey } from './signature';

export const DEFAULT_ANALYSIS_TTL_SECONDS = 60 * 60;
export const DEFAULT_INGESTION_TTL_SECONDS = 24 * 60 * 60;

const ENTRY_VERSION = 1;

const entrySchema = z
  .object({
    version: z.literal(ENTRY_VERSION),
    key: z.string(),
    inserted_at: z.number().int().nonnegative(),
    ttl: z.number().int().positive(),
    payload: z.unknown(),
  })
  .strict();

export interface CacheEntry<T> {
  key: string;
  payload: T;
  inserted_at: number; // epoch ms
  ttl: number; // seconds
}

export interface QueryCacheOptions {
  analysisTtlSeconds?: number;
  ingestionTtlSeconds?: number;
  now?: () => number;
}

type Lookup<T> = { hit: true; entry: CacheEntry<T> } | { hit: false };

export class QueryCache {
  private readonly analysisTtl: number;
  private readonly ingestionTtl: number;
  private readonly now: () => number;

  constructor(private store: CacheStore, options: QueryCacheOptions = {}) {
    this.analysisTtl = options.analysisTtlSeconds ?? DEFAULT_ANALYSIS_TTL_SECONDS;
    this.ingestionTtl = options.ingestionTtlSeconds ?? DEFAULT_INGESTION_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  ttlFor(kind: SignatureKind): number {
    return kind === 'ingestion' ? this.ingestionTtl : this.analysisTtl;
  }

  /**
   * Returns the cached payload for `signature` when one is present and
   * unexpired; otherwise runs `compute` and stores its result. Cache
   * failures of any kind fall back to `compute`. Errors thrown by
   * `compute` itself propagate.
   */
  async getOrCompute<T>(
    signature: QuerySignature,
    schema: z.ZodType<T>,
    compute: () => Promise<T>
  ): Promise<T> {
    const key = signatureKey(signature);

    const cached = await this.lookup(key, schema);
    if (cached.hit) {
      console.log(`[QueryCache] Hit ${key}`);
      return cached.entry.payload;
    }

    const payload = await compute();
    await this.write({ key, payload, inserted_at: this.now(), ttl: this.ttlFor(signature.kind) });
    return payload;
  }

  private async lookup<T>(key: string, schema: z.ZodType<T>): Promise<Lookup<T>> {
    try {
      if (!(await this.store.exists(key))) return { hit: false };

      const raw = await this.store.get(key);
      if (raw === null) return { hit: false };

      const entry = deserializeEntry(raw, schema);
      if (entry.key !== key) {
        throw new CacheUnavailableError(`Entry under ${key} was written for ${entry.key}`);
      }
      if (this.now() >= entry.inserted_at + entry.ttl * 1000) {
        console.log(`[QueryCache] Expired ${key}`);
        return { hit: false };
      }
      return { hit: true, entry };
    } catch (err) {
      console.warn(`[QueryCache] Lookup failed for ${key}, computing directly:`, errorMessage(err));
      return { hit: false };
    }
  }

  private async write<T>(entry: CacheEntry<T>): Promise<void> {
    try {
      await this.store.set(entry.key, serializeEntry(entry), entry.ttl);
    } catch (err) {
      console.warn(`[QueryCache] Write failed for ${entry.key}:`, errorMessage(err));
    }
  }
}

// ── Serialization ──

export function serializeEntry<T>(entry: CacheEntry<T>): string {
  return JSON.stringify({
    version: ENTRY_VERSION,
    key: entry.key,
    inserted_at: entry.inserted_at,
    ttl: entry.ttl,
    payload: entry.payload,
  });
}

/** Parses a stored entry; throws CacheUnavailableError unless both envelope and payload validate. */
export function deserializeEntry<T>(raw: string, schema: z.ZodType<T>): CacheEntry<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CacheUnavailableError('Cache entry is not valid JSON', err);
  }

  const envelope = entrySchema.safeParse(parsed);
  if (!envelope.success) {
    throw new CacheUnavailableError(`Malformed cache envelope: ${envelope.error.message}`);
  }

  const payload = schema.safeParse(envelope.data.payload);
  if (!payload.success) {
    throw new CacheUnavailableError(`Cached payload failed validation: ${payload.error.message}`);
  }

  return {
    key: envelope.data.key,
    payload: payload.data,
    inserted_at: envelope.data.inserted_at,
    ttl: envelope.data.ttl,
  };
}
