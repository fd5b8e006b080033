import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      databaseUrl: 'postgres://localhost:5432/sales_ledger',
      cache: { backend: 'postgres', analysisTtlSeconds: 3600, ingestionTtlSeconds: 86400 },
    });
  });

  it('should coerce numeric settings from strings', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_URL: 'postgres://test:test-secret@db:5432/sales',
      CACHE_BACKEND: 'memory',
      ANALYTICS_CACHE_TTL_SECONDS: '60',
      INGESTION_CACHE_TTL_SECONDS: '600',
    });

    expect(config.port).toBe(8080);
    expect(config.databaseUrl).toBe('postgres://test:test-secret@db:5432/sales');
    expect(config.cache).toEqual({ backend: 'memory', analysisTtlSeconds: 60, ingestionTtlSeconds: 600 });
  });

  it('should name every invalid setting', () => {
    expect(() => loadConfig({ CACHE_BACKEND: 'redis', ANALYTICS_CACHE_TTL_SECONDS: '-5' })).toThrow(
      /^Invalid configuration: CACHE_BACKEND: .*; ANALYTICS_CACHE_TTL_SECONDS: /
    );
  });
});
