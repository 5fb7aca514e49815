import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { CacheStore } from './cache.interface';

export const KEY_PREFIX = 'weather-iot:cache:';

export type RedisClient = Pick<
  Redis,
  'get' | 'setex' | 'del' | 'keys' | 'ping' | 'quit' | 'on'
>;

export class RedisCacheStore implements CacheStore, OnModuleDestroy {
  readonly backend = 'redis';
  private readonly logger = new Logger(RedisCacheStore.name);

  constructor(private readonly redis: RedisClient) {
    this.redis.on('connect', () => {
      this.logger.log('Connected to Redis cache');
    });

    this.redis.on('error', (error: Error) => {
      this.logger.error(`Redis cache connection error: ${error.message}`);
    });
  }

  static fromUrl(url: string): RedisCacheStore {
    return new RedisCacheStore(
      new Redis(url, {
        enableReadyCheck: false,
        maxRetriesPerRequest: 1,
        lazyConnect: true,
        keyPrefix: KEY_PREFIX,
      }),
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    this.logger.log('Redis connection closed');
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.setex(key, ttlSeconds, value);
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(key);
    return removed > 0;
  }

  async clear(): Promise<void> {
    // keys() returns prefixed names while del() prefixes again
    const keys = await this.redis.keys(`${KEY_PREFIX}*`);
    if (keys.length > 0) {
      await this.redis.del(...keys.map((key) => key.slice(KEY_PREFIX.length)));
    }
    this.logger.log('Redis cache cleared');
  }

  async size(): Promise<number> {
    const keys = await this.redis.keys(`${KEY_PREFIX}*`);
    return keys.length;
  }

  async ping(): Promise<boolean> {
    const reply = await this.redis.ping();
    return reply === 'PONG';
  }
}
