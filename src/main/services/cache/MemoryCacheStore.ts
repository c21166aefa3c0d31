import type { CacheStore } from '@main/services/cache/CacheStore';

interface MemoryCacheEntry {
  value: unknown;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryCacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    return structuredClone(entry.value);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value: structuredClone(value),
      expiresAt: this.now() + Math.max(0, ttlSeconds) * 1000
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.expiresAt > this.now();
  }
}
