import type { CacheStore } from '@nestjs/cache-manager';
import { CacheModule } from '@nestjs/cache-manager';
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';

import { StoreService } from './store.service';

type NamedStore = CacheStore & { isFallback?: boolean; isRedis?: boolean; name?: string };

@Module({
  imports: [
    CacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => {
        const logger = new Logger(StoreModule.name);
        const redisUrl = configService.get<string>('STORE_REDIS_URL') ?? '';

        // Without a backend every key operation fails with StoreUnavailableError.
        const unavailableStore: NamedStore = {
          get: async () => undefined,
          set: async () => undefined,
          del: async () => undefined,
          isFallback: true,
          isRedis: false,
          name: 'unavailable',
        };

        if (redisUrl.length === 0) {
          logger.warn('STORE_REDIS_URL is empty; key store is unavailable.');
          return { store: unavailableStore };
        }

        try {
          const store: NamedStore = await redisStore({ url: redisUrl });
          store.isFallback = false;
          store.isRedis = true;
          store.name ??= 'redis';
          return { store };
        } catch (error) {
          logger.error(
            'Redis connection failed; key store is unavailable.',
            error instanceof Error ? error.stack : undefined,
          );
          return { store: unavailableStore };
        }
      },
    }),
  ],
  providers: [StoreService],
  exports: [StoreService],
})
export class StoreModule {}
