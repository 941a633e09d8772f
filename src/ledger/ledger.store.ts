import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WatchError } from 'redis';

import { RedisService } from '../redis/redis.service';
import { hashKeyForLogging } from '../utils/hash';
import { LedgerException } from './ledger.errors';
import { KeyRecord, LedgerTransition, ServiceRecord } from './types';

type RedisTransaction = {
  set: (key: string, value: string) => RedisTransaction;
  sAdd: (key: string, member: string) => RedisTransaction;
  exec: () => Promise<unknown>;
};

type RedisClient = {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, options?: { NX?: boolean }) => Promise<string | null>;
  sMembers: (key: string) => Promise<string[]>;
  watch: (keys: string | string[]) => Promise<unknown>;
  unwatch: () => Promise<unknown>;
  multi: () => RedisTransaction;
  executeIsolated: <T>(fn: (isolated: RedisClient) => Promise<T>) => Promise<T>;
};

/**
 * Ledger records in Redis. Every mutating call runs as one optimistic transaction: the
 * records it reads are WATCHed and all of its writes go out in a single MULTI/EXEC, so a
 * service counter and its key are either both updated or neither is.
 */
@Injectable()
export class LedgerStore {
  private readonly logger = new Logger(LedgerStore.name);
  private readonly redisPrefix: string;

  constructor(
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {
    this.redisPrefix = this.configService.get<string>('LEDGER_REDIS_PREFIX') ?? 'key-ledger';
  }

  async insertService(record: ServiceRecord): Promise<ServiceRecord> {
    const redis = this.getRedisClient();
    const stored = await redis.set(this.serviceKey(record.id), JSON.stringify(record), {
      NX: true,
    });
    if (stored === null) {
      throw new LedgerException('ServiceAlreadyExists');
    }

    return record;
  }

  async getService(serviceId: string): Promise<ServiceRecord> {
    return this.readService(this.getRedisClient(), serviceId);
  }

  async getKey(keyId: string): Promise<KeyRecord> {
    return this.readKey(this.getRedisClient(), keyId);
  }

  async listKeys(serviceId: string): Promise<KeyRecord[]> {
    const redis = this.getRedisClient();
    const keyIds = await redis.sMembers(this.indexKey(serviceId));

    const records: KeyRecord[] = [];
    for (const keyId of keyIds) {
      const record = await this.parse<KeyRecord>(redis, this.keyKey(keyId));
      if (record) {
        records.push(record);
      }
    }

    return records.sort((a, b) => a.sequence - b.sequence);
  }

  /** Transaction over a service alone; a key in the writes is treated as newly issued. */
  async updateService<T>(
    serviceId: string,
    apply: (service: ServiceRecord) => LedgerTransition<T>,
  ): Promise<T> {
    return this.transact(serviceId, null, (service) => apply(service));
  }

  async updateKey<T>(
    serviceId: string,
    keyId: string,
    apply: (service: ServiceRecord, key: KeyRecord) => LedgerTransition<T>,
  ): Promise<T> {
    return this.transact(serviceId, keyId, (service, key) => {
      if (!key) {
        throw new LedgerException('KeyNotFound');
      }
      return apply(service, key);
    });
  }

  private async transact<T>(
    serviceId: string,
    keyId: string | null,
    apply: (service: ServiceRecord, key: KeyRecord | null) => LedgerTransition<T>,
  ): Promise<T> {
    const redis = this.getRedisClient();

    return redis.executeIsolated(async (client) => {
      const serviceKey = this.serviceKey(serviceId);
      await client.watch(keyId ? [serviceKey, this.keyKey(keyId)] : serviceKey);

      try {
        const service = await this.readService(client, serviceId);
        const key = keyId ? await this.readKey(client, keyId) : null;
        const { writes, result } = apply(service, key);

        const issued = writes.key && writes.key.id !== keyId ? writes.key : null;
        if (issued) {
          await client.watch(this.keyKey(issued.id));
          if ((await client.get(this.keyKey(issued.id))) !== null) {
            throw new LedgerException('KeyAlreadyExists');
          }
        }

        const multi = client.multi();
        if (writes.service) {
          multi.set(serviceKey, JSON.stringify(writes.service));
        }
        if (writes.key) {
          multi.set(this.keyKey(writes.key.id), JSON.stringify(writes.key));
        }
        if (issued) {
          multi.sAdd(this.indexKey(serviceId), issued.id);
        }
        await multi.exec();

        return result;
      } catch (error) {
        if (error instanceof WatchError) {
          this.logger.warn(
            `Concurrent write on service hash ${hashKeyForLogging(serviceId)}; transaction aborted`,
          );
          throw new LedgerException('ConcurrentModification');
        }
        await client.unwatch();
        throw error;
      }
    });
  }

  private async readService(redis: RedisClient, serviceId: string): Promise<ServiceRecord> {
    const record = await this.parse<ServiceRecord>(redis, this.serviceKey(serviceId));
    if (!record) {
      throw new LedgerException('ServiceNotFound');
    }
    return record;
  }

  private async readKey(redis: RedisClient, keyId: string): Promise<KeyRecord> {
    const record = await this.parse<KeyRecord>(redis, this.keyKey(keyId));
    if (!record) {
      throw new LedgerException('KeyNotFound');
    }
    return record;
  }

  private async parse<T>(redis: RedisClient, redisKey: string): Promise<T | null> {
    const raw = await redis.get(redisKey);
    if (!raw) {
      return null;
    }

    try {
      return JSON.parse(raw) as T;
    } catch {
      this.logger.warn(`Invalid ledger record payload for key hash ${hashKeyForLogging(redisKey)}`);
      return null;
    }
  }

  private getRedisClient(): RedisClient {
    const client = this.redisService.getStoreClient<RedisClient>();
    if (!client) {
      this.logger.error('Redis client unavailable for ledger store');
      throw new ServiceUnavailableException('Ledger backend unavailable');
    }

    return client;
  }

  private serviceKey(serviceId: string): string {
    return `${this.redisPrefix}:service:${serviceId}`;
  }

  private keyKey(keyId: string): string {
    return `${this.redisPrefix}:key:${keyId}`;
  }

  private indexKey(serviceId: string): string {
    return `${this.redisPrefix}:service:${serviceId}:keys`;
  }
}
