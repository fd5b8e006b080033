import { CacheStore } from '../../src/shared/contracts';

/** Backend that is down: every call rejects. */
export class FailingCacheStore implements CacheStore {
  calls = 0;

  async exists(): Promise<boolean> {
    this.calls++;
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }

  async get(): Promise<string | null> {
    this.calls++;
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }

  async set(): Promise<void> {
    this.calls++;
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }
}

/** Keeps every value forever and records the TTL each write asked for. */
export class RecordingCacheStore implements CacheStore {
  readonly values = new Map<string, string>();
  readonly writes: { key: string; ttlSeconds: number }[] = [];

  async exists(key: string): Promise<boolean> {
    return this.values.has(key);
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, value);
    this.writes.push({ key, ttlSeconds });
  }
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
