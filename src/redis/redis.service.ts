import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Cache } from 'cache-manager';

type RedisStoreClient = {
  ping?: () => Promise<string>;
};

type RedisStore = {
  client?: RedisStoreClient;
  isFallback?: boolean;
  name?: string;
};

/**
 * Hands out the raw Redis client behind the cache-manager store. The ledger talks to Redis
 * directly because it needs WATCH/MULTI transactions, which cache-manager does not expose.
 */
@Injectable()
export class RedisService {
  private readonly logger = new Logger(RedisService.name);

  constructor(@Inject(CACHE_MANAGER) private readonly cacheManager: Cache) {}

  getStoreClient<T>(): T | null {
    const store = this.getStore();
    if (!store || store.isFallback || !store.client) {
      return null;
    }

    return store.client as T;
  }

  async checkHealth(): Promise<{ status: 'ok' | 'degraded'; message?: string }> {
    try {
      const store = this.getStore();
      if (!store?.client?.ping || store.isFallback) {
        return { status: 'degraded', message: 'Redis client unavailable' };
      }
      await store.client.ping();
      return { status: 'ok' };
    } catch (error) {
      this.logger.warn('Redis health check failed');
      return { status: 'degraded', message: 'Redis backend unreachable' };
    }
  }

  private getStore(): RedisStore | undefined {
    return (this.cacheManager as { store?: RedisStore }).store;
  }
}
