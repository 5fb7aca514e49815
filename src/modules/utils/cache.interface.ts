export const CACHE_STORE = Symbol('CACHE_STORE');

export interface CacheEntry {
  value: string;
  cachedAt: number;
  expiresAt: number;
}

export interface CacheStats {
  backend: 'memory' | 'redis';
  hits: number;
  misses: number;
  entries: number;
  hitRate: number;
}

/**
 * Key-value storage for serialized values with a per-entry TTL.
 * Implementations may throw on outage; {@link CacheService} absorbs that.
 */
export interface CacheStore {
  readonly backend: CacheStats['backend'];
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): Promise<number>;
  ping(): Promise<boolean>;
}
