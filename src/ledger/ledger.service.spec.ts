import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { buildCacheManager, FakeRedis } from '../../test/support/fake-redis';
import { RedisService } from '../redis/redis.service';
import { LEDGER_CLOCK } from './ledger.clock';
import { LedgerService } from './ledger.service';
import { LedgerStore } from './ledger.store';
import { SECONDS_PER_DAY } from './rate-limit';
import { KeyRecord, ServiceRecord } from './types';

describe('LedgerService', () => {
  const authority = 'backend';
  const owner = 'alice';
  let ledger: LedgerService;
  let clock: { now: jest.Mock<number, []> };
  let service: ServiceRecord;

  beforeEach(async () => {
    const redis = new FakeRedis();
    clock = { now: jest.fn(() => 1_700_000_000) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerService,
        LedgerStore,
        RedisService,
        { provide: CACHE_MANAGER, useValue: buildCacheManager(redis) },
        { provide: LEDGER_CLOCK, useValue: clock },
        {
          provide: ConfigService,
          useValue: {
            get: (key: string) => (key === 'LEDGER_REDIS_PREFIX' ? 'svc-test' : undefined),
          },
        },
      ],
    }).compile();

    ledger = module.get<LedgerService>(LedgerService);
    service = await ledger.createService(authority, { name: 'weather-api', defaultRateLimit: 5 });
  });

  it('applies the default limit and resets it on the next day', async () => {
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: ['read'] });
    expect(key.rateLimit).toBe(5);

    for (let i = 0; i < 5; i += 1) {
      await ledger.recordRequest(service.id, key.id, authority);
    }
    const afterFive = await ledger.getKey(service.id, key.id, owner);
    expect(afterFive.requestsToday).toBe(5);
    expect(afterFive.totalRequests).toBe(5);

    await expect(ledger.recordRequest(service.id, key.id, authority)).rejects.toMatchObject({
      code: 'RateLimitExceeded',
    });
    expect(await ledger.getKey(service.id, key.id, owner)).toEqual(afterFive);

    clock.now.mockReturnValue(1_700_000_000 + SECONDS_PER_DAY);
    const { key: nextDay, rateLimit } = await ledger.recordRequest(service.id, key.id, authority);
    expect(nextDay.requestsToday).toBe(1);
    expect(nextDay.totalRequests).toBe(6);
    expect(rateLimit.remaining).toBe(4);
  });

  it('expires keys lazily', async () => {
    const key = await ledger.createKey(service.id, owner, {
      name: 'temp',
      scopes: ['read'],
      expiresAt: 1_700_001_000,
    });

    clock.now.mockReturnValue(1_700_000_999);
    await expect(ledger.recordRequest(service.id, key.id, authority)).resolves.toBeDefined();

    clock.now.mockReturnValue(1_700_001_001);
    await expect(ledger.recordRequest(service.id, key.id, authority)).rejects.toMatchObject({
      code: 'KeyExpired',
    });
    await expect(ledger.validateScope(service.id, key.id, 'read')).rejects.toMatchObject({
      code: 'KeyExpired',
    });
  });

  it('validates scopes with the wildcard', async () => {
    const wildcard = await ledger.createKey(service.id, owner, {
      name: 'ops',
      scopes: ['read', '*'],
    });
    const readOnly = await ledger.createKey(service.id, owner, { name: 'ro', scopes: ['read'] });

    await expect(ledger.validateScope(service.id, wildcard.id, 'write')).resolves.toEqual(wildcard);
    await expect(ledger.validateScope(service.id, wildcard.id, 'read')).resolves.toEqual(wildcard);
    await expect(ledger.validateScope(service.id, readOnly.id, 'write')).rejects.toMatchObject({
      code: 'InsufficientPermissions',
    });
  });

  it('restores the active count after revoke and reactivate', async () => {
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: [] });
    await ledger.createKey(service.id, 'bob', { name: 'cli', scopes: [] });
    const before = await ledger.getService(service.id);

    await ledger.revokeKey(service.id, key.id, owner);
    expect((await ledger.getService(service.id)).activeKeys).toBe(before.activeKeys - 1);
    await expect(ledger.recordRequest(service.id, key.id, authority)).rejects.toMatchObject({
      code: 'KeyInactive',
    });

    const reactivated = await ledger.reactivateKey(service.id, key.id, authority);
    expect(reactivated.isActive).toBe(true);
    expect(await ledger.getService(service.id)).toEqual(before);
  });

  it('keeps 0 <= activeKeys <= totalKeys across lifecycle calls', async () => {
    const keys: KeyRecord[] = [];
    for (const name of ['a', 'b', 'c']) {
      keys.push(await ledger.createKey(service.id, owner, { name, scopes: [] }));
    }

    const steps: Array<['revoke' | 'reactivate', number]> = [
      ['revoke', 0],
      ['revoke', 1],
      ['revoke', 0],
      ['reactivate', 1],
      ['revoke', 2],
      ['reactivate', 1],
      ['reactivate', 0],
    ];
    for (const [action, index] of steps) {
      const keyId = keys[index].id;
      const call =
        action === 'revoke'
          ? ledger.revokeKey(service.id, keyId, owner)
          : ledger.reactivateKey(service.id, keyId, owner);
      await call.catch(() => undefined);

      const current = await ledger.getService(service.id);
      expect(current.activeKeys).toBeGreaterThanOrEqual(0);
      expect(current.activeKeys).toBeLessThanOrEqual(current.totalKeys);
    }

    const final = await ledger.getService(service.id);
    expect(final.totalKeys).toBe(3);
    expect(final.activeKeys).toBe(2);
  });

  it('leaves scopes unchanged when an update has nine entries', async () => {
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: ['read'] });
    const nine = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i'];

    await expect(ledger.updateScopes(service.id, key.id, authority, nine)).rejects.toMatchObject({
      code: 'TooManyScopes',
    });
    expect((await ledger.getKey(service.id, key.id, authority)).scopes).toEqual(['read']);
  });

  it('applies administrative updates for the authority only', async () => {
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: ['read'] });

    await expect(ledger.updateRateLimit(service.id, key.id, owner, 100)).rejects.toMatchObject({
      code: 'Unauthorized',
    });

    await ledger.updateRateLimit(service.id, key.id, authority, 100);
    await ledger.updateScopes(service.id, key.id, authority, ['read', 'write']);
    await ledger.extendExpiration(service.id, key.id, authority, 1_700_050_000);

    const updated = await ledger.getKey(service.id, key.id, owner);
    expect(updated.rateLimit).toBe(100);
    expect(updated.scopes).toEqual(['read', 'write']);
    expect(updated.expiration).toEqual({ kind: 'at', timestamp: 1_700_050_000 });
  });

  it('guards key queries by role', async () => {
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: [] });

    await expect(ledger.getKey(service.id, key.id, 'mallory')).rejects.toMatchObject({
      code: 'Unauthorized',
    });
    await expect(ledger.listKeys(service.id, owner)).rejects.toMatchObject({
      code: 'Unauthorized',
    });
    await expect(ledger.listKeys(service.id, authority)).resolves.toEqual([key]);
  });

  it('rejects keys addressed through another service', async () => {
    const other = await ledger.createService('other-backend', {
      name: 'maps-api',
      defaultRateLimit: 1,
    });
    const key = await ledger.createKey(service.id, owner, { name: 'mobile', scopes: ['*'] });

    await expect(ledger.recordRequest(other.id, key.id, 'other-backend')).rejects.toMatchObject({
      code: 'ServiceMismatch',
    });
    await expect(ledger.validateScope(other.id, key.id, 'read')).rejects.toMatchObject({
      code: 'ServiceMismatch',
    });
  });

  it('rejects a second service for the same authority', async () => {
    await expect(
      ledger.createService(authority, { name: 'duplicate', defaultRateLimit: 1 }),
    ).rejects.toMatchObject({ code: 'ServiceAlreadyExists' });
  });
});
