import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CACHE_STORE, CacheStore } from './cache.interface';
import { CacheService } from './cache.service';
import { CacheControlInterceptor } from './cache-control.interceptor';
import { MemoryCacheStore } from './memory-cache.store';
import { RedisCacheStore } from './redis-cache.store';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CACHE_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): CacheStore => {
        const logger = new Logger('CacheStore');
        const redisUrl = configService.get<string>('REDIS_URL');

        if (redisUrl) {
          logger.log('Cache service initialized with Redis backend');
          return RedisCacheStore.fromUrl(redisUrl);
        }

        logger.log('REDIS_URL not set, using in-memory cache');
        return new MemoryCacheStore(
          configService.get<number>('CACHE_MAX_ENTRIES', 1000),
        );
      },
    },
    CacheService,
    CacheControlInterceptor,
  ],
  exports: [CacheService, CacheControlInterceptor],
})
export class UtilsModule {}
