// ──────────────────────────────────────────
// Analytics: In-process cache store
// ──────────────────────────────────────────

import { CacheStore } from '../../../shared/contracts';

interface StoredValue {
  value: string;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, StoredValue>();

  constructor(private now: () => number = Date.now) {}

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== null;
  }

  async get(key: string): Promise<string | null> {
    return this.read(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  get size(): number {
    return this.entries.size;
  }

  // Expired entries are dropped when read; there is no sweeper
  private read(key: string): string | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }
}
