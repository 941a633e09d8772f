import type { CacheStore } from '@nestjs/cache-manager';
import { CacheModule } from '@nestjs/cache-manager';
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';

import { RedisService } from './redis.service';

@Module({
  imports: [
    CacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => {
        const logger = new Logger(RedisModule.name);
        const redisUrl = configService.get<string>('LEDGER_REDIS_URL') ?? '';

        const noopStore: CacheStore & { isFallback: boolean; name?: string } = {
          get: async <T>() => undefined as T | undefined,
          set: async () => undefined,
          del: async () => undefined,
          isFallback: true,
          name: 'noop',
        };

        if (!redisUrl) {
          logger.warn('LEDGER_REDIS_URL is empty; ledger store disabled.');
          return { store: noopStore };
        }

        try {
          const store = (await redisStore({ url: redisUrl })) as CacheStore & {
            isFallback?: boolean;
            name?: string;
          };
          store.isFallback = false;
          store.name ??= 'redis';
          return { store };
        } catch (error) {
          // The ledger answers 503 until Redis is reachable; health reports degraded.
          logger.warn('Redis unavailable; ledger store disabled.');
          return { store: noopStore };
        }
      },
    }),
  ],
  providers: [RedisService],
  exports: [RedisService],
})
export class RedisModule {}
