import { Logger } from '@nestjs/common';
import { CacheEntry, CacheStore } from './cache.interface';

export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory';
  private readonly logger = new Logger(MemoryCacheStore.name);
  private readonly cache = new Map<string, CacheEntry>();

  constructor(private readonly maxEntries: number = 1000) {}

  async get(key: string): Promise<string | null> {
    const entry = this.cache.get(key);

    if (!entry) {
      return null;
    }

    // Expired entries are dropped on read; there is no background sweep
    if (Date.now() >= entry.expiresAt) {
      this.logger.debug(`Cache entry expired for key: ${key}`);
      this.cache.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = Date.now();

    // Re-inserting moves the key to the end of the Map's insertion order
    this.cache.delete(key);
    this.cache.set(key, {
      value,
      cachedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    });

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
      this.logger.debug(`Evicted oldest cache entry: ${oldest.value}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<void> {
    const size = this.cache.size;
    this.cache.clear();
    this.logger.log(`Cleared memory cache: ${size} entries removed`);
  }

  async size(): Promise<number> {
    return this.cache.size;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
