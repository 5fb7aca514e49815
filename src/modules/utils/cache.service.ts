import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_STORE, CacheStats, CacheStore } from './cache.interface';

/**
 * Advisory JSON cache in front of the configured {@link CacheStore}.
 * A store outage degrades to "always miss"; it never fails the caller.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);
  private stats = {
    hits: 0,
    misses: 0,
  };

  constructor(@Inject(CACHE_STORE) private readonly store: CacheStore) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.store.get(key);

      if (raw === null) {
        this.stats.misses++;
        return null;
      }

      this.stats.hits++;
      const value: T = JSON.parse(raw);
      return value;
    } catch (error) {
      this.logger.warn(
        `Cache read failed for key ${key}, treating as miss: ${describe(error)}`,
      );
      this.stats.misses++;
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    try {
      await this.store.set(key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      this.logger.warn(
        `Cache write failed for key ${key}: ${describe(error)}`,
      );
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      return await this.store.delete(key);
    } catch (error) {
      this.logger.warn(`Cache delete failed for key ${key}: ${describe(error)}`);
      return false;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await this.store.ping();
    } catch (error) {
      this.logger.debug(`Cache ping failed: ${describe(error)}`);
      return false;
    }
  }

  async getStats(): Promise<CacheStats> {
    let entries = 0;
    try {
      entries = await this.store.size();
    } catch (error) {
      this.logger.debug(`Cache size unavailable: ${describe(error)}`);
    }

    const lookups = this.stats.hits + this.stats.misses;
    return {
      backend: this.store.backend,
      hits: this.stats.hits,
      misses: this.stats.misses,
      entries,
      hitRate: lookups === 0 ? 0 : this.stats.hits / lookups,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
