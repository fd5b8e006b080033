import { z } from 'zod';
import {
  DEFAULT_ANALYSIS_TTL_SECONDS,
  DEFAULT_INGESTION_TTL_SECONDS,
  QueryCache,
  deserializeEntry,
  serializeEntry,
} from '../src/domains/analytics/cache/query-cache';
import { MemoryCacheStore } from '../src/domains/analytics/cache/memory.store';
import { analysisSignature, ingestionSignature, signatureKey } from '../src/domains/analytics/cache/signature';
import { CacheUnavailableError } from '../src/shared/errors';
import { FailingCacheStore, RecordingCacheStore, silenceConsole } from './fakes/cache-stores';

const payloadSchema = z.object({ value: z.number() }).strict();
type Payload = z.infer<typeof payloadSchema>;

const OPEN_SCOPE = { start: null, end: null };
const productSig = analysisSignature('product', OPEN_SCOPE);
const PRODUCT_KEY = 'sales:product:*:*:-';

describe('signatureKey', () => {
  it('should encode kind, bounds and interval', () => {
    expect(
      signatureKey(analysisSignature('time_series', { start: '2023-01-01', end: '2023-01-31' }, 'week'))
    ).toBe('sales:time_series:2023-01-01:2023-01-31:week');
  });

  it('should use placeholders for open bounds and no interval', () => {
    expect(signatureKey(productSig)).toBe(PRODUCT_KEY);
    expect(signatureKey(analysisSignature('overview', { start: '2023-01-01', end: null }))).toBe(
      'sales:overview:2023-01-01:*:-'
    );
  });

  it('should key ingestion by batch key', () => {
    expect(signatureKey(ingestionSignature('batch-1'))).toBe('sales:ingestion:batch-1');
  });
});

describe('QueryCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should compute on a miss and serve the stored payload afterwards', async () => {
    const cache = new QueryCache(new MemoryCacheStore(clock), { now: clock });
    const compute = jest.fn(async (): Promise<Payload> => ({ value: 42 }));

    const first = await cache.getOrCompute(productSig, payloadSchema, compute);
    const second = await cache.getOrCompute(productSig, payloadSchema, compute);

    expect(first).toEqual({ value: 42 });
    expect(second).toEqual({ value: 42 });
    expect(compute).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith(`[QueryCache] Hit ${PRODUCT_KEY}`);
  });

  it('should keep different signatures apart', async () => {
    const cache = new QueryCache(new MemoryCacheStore(clock), { now: clock });
    const weekly = analysisSignature('time_series', OPEN_SCOPE, 'week');
    const monthly = analysisSignature('time_series', OPEN_SCOPE, 'month');

    await cache.getOrCompute(weekly, payloadSchema, async () => ({ value: 1 }));
    const result = await cache.getOrCompute(monthly, payloadSchema, async () => ({ value: 2 }));

    expect(result).toEqual({ value: 2 });
  });

  it('should write analyses and ingestion reports with their own TTLs', async () => {
    const store = new RecordingCacheStore();
    const cache = new QueryCache(store, { now: clock });

    await cache.getOrCompute(productSig, payloadSchema, async () => ({ value: 1 }));
    await cache.getOrCompute(ingestionSignature('batch-1'), payloadSchema, async () => ({ value: 2 }));

    expect(store.writes).toEqual([
      { key: PRODUCT_KEY, ttlSeconds: DEFAULT_ANALYSIS_TTL_SECONDS },
      { key: 'sales:ingestion:batch-1', ttlSeconds: DEFAULT_INGESTION_TTL_SECONDS },
    ]);
    expect(DEFAULT_ANALYSIS_TTL_SECONDS).toBe(3600);
    expect(DEFAULT_INGESTION_TTL_SECONDS).toBe(86400);
  });

  it('should honour configured TTLs', () => {
    const cache = new QueryCache(new RecordingCacheStore(), { analysisTtlSeconds: 60, ingestionTtlSeconds: 120 });

    expect(cache.ttlFor('customer')).toBe(60);
    expect(cache.ttlFor('ingestion')).toBe(120);
  });

  it('should treat an entry as expired once its TTL has elapsed', async () => {
    // The store never forgets, so expiry comes from the entry itself
    const store = new RecordingCacheStore();
    const cache = new QueryCache(store, { now: clock });
    let calls = 0;
    const compute = async (): Promise<Payload> => ({ value: ++calls });

    await cache.getOrCompute(productSig, payloadSchema, compute);

    now += DEFAULT_ANALYSIS_TTL_SECONDS * 1000 - 1;
    expect(await cache.getOrCompute(productSig, payloadSchema, compute)).toEqual({ value: 1 });

    now += 1;
    expect(await cache.getOrCompute(productSig, payloadSchema, compute)).toEqual({ value: 2 });
    expect(console.log).toHaveBeenCalledWith(`[QueryCache] Expired ${PRODUCT_KEY}`);
  });

  it('should fail open when the store is unreachable', async () => {
    const store = new FailingCacheStore();
    const cache = new QueryCache(store, { now: clock });
    const compute = jest.fn(async (): Promise<Payload> => ({ value: 7 }));

    await expect(cache.getOrCompute(productSig, payloadSchema, compute)).resolves.toEqual({ value: 7 });
    expect(compute).toHaveBeenCalledTimes(1);
    // exists() on lookup, set() on write
    expect(store.calls).toBe(2);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('should recompute over an entry that is not JSON and replace it', async () => {
    const store = new RecordingCacheStore();
    store.values.set(PRODUCT_KEY, '{not json');
    const cache = new QueryCache(store, { now: clock });

    const result = await cache.getOrCompute(productSig, payloadSchema, async () => ({ value: 3 }));

    expect(result).toEqual({ value: 3 });
    expect(deserializeEntry(store.values.get(PRODUCT_KEY) ?? '', payloadSchema).payload).toEqual({ value: 3 });
  });

  it('should recompute when the cached payload does not match its schema', async () => {
    const store = new RecordingCacheStore();
    store.values.set(
      PRODUCT_KEY,
      serializeEntry({ key: PRODUCT_KEY, payload: { value: 'three' }, inserted_at: now, ttl: 3600 })
    );
    const cache = new QueryCache(store, { now: clock });

    const result = await cache.getOrCompute(productSig, payloadSchema, async () => ({ value: 3 }));

    expect(result).toEqual({ value: 3 });
  });

  it('should recompute when the entry was written under another key', async () => {
    const store = new RecordingCacheStore();
    store.values.set(
      PRODUCT_KEY,
      serializeEntry({ key: 'sales:customer:*:*:-', payload: { value: 9 }, inserted_at: now, ttl: 3600 })
    );
    const cache = new QueryCache(store, { now: clock });

    const result = await cache.getOrCompute(productSig, payloadSchema, async () => ({ value: 4 }));

    expect(result).toEqual({ value: 4 });
  });

  it('should propagate compute errors and store nothing', async () => {
    const store = new RecordingCacheStore();
    const cache = new QueryCache(store, { now: clock });

    await expect(
      cache.getOrCompute(productSig, payloadSchema, async () => {
        throw new Error('ledger down');
      })
    ).rejects.toThrow('ledger down');
    expect(store.writes).toEqual([]);
  });

  it('should return floats exactly as computed', async () => {
    const cache = new QueryCache(new RecordingCacheStore(), { now: clock });
    const compute = jest.fn(async (): Promise<Payload> => ({ value: 0.1 + 0.2 }));

    await cache.getOrCompute(productSig, payloadSchema, compute);
    const cached = await cache.getOrCompute(productSig, payloadSchema, compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(cached.value).toBe(0.1 + 0.2);
  });
});

describe('deserializeEntry', () => {
  it('should reject an envelope with an unknown version', () => {
    const raw = JSON.stringify({ version: 2, key: 'k', inserted_at: 0, ttl: 1, payload: { value: 1 } });
    expect(() => deserializeEntry(raw, payloadSchema)).toThrow(CacheUnavailableError);
  });

  it('should read back what serializeEntry wrote', () => {
    const entry = { key: 'k', payload: { value: 5 }, inserted_at: 10, ttl: 60 };
    expect(deserializeEntry(serializeEntry(entry), payloadSchema)).toEqual(entry);
  });
});

describe('MemoryCacheStore', () => {
  it('should forget values once their TTL passes', async () => {
    let now = 0;
    const store = new MemoryCacheStore(() => now);
    await store.set('k', 'v', 10);

    now = 9_999;
    expect(await store.exists('k')).toBe(true);
    expect(await store.get('k')).toBe('v');

    now = 10_000;
    expect(await store.exists('k')).toBe(false);
    expect(await store.get('k')).toBeNull();
    expect(store.size).toBe(0);
  });
});
