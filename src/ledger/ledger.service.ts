import { Inject, Injectable, Logger } from '@nestjs/common';

import { LEDGER_CLOCK, LedgerClock } from './ledger.clock';
import {
  authorize,
  assertKeyBelongsTo,
  changeRateLimit,
  checkScope,
  extendExpiration,
  initializeService,
  issueKey,
  reactivateKey,
  recordRequest,
  replaceScopes,
  revokeKey,
} from './ledger.rules';
import { LedgerStore } from './ledger.store';
import {
  CreateKeyInput,
  CreateServiceInput,
  KeyRecord,
  RecordRequestResult,
  ServiceRecord,
} from './types';

@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    private readonly store: LedgerStore,
    @Inject(LEDGER_CLOCK) private readonly clock: LedgerClock,
  ) {}

  async createService(authority: string, input: CreateServiceInput): Promise<ServiceRecord> {
    const service = await this.store.insertService(initializeService(authority, input));
    this.logger.log(`Service '${service.name}' initialized (${service.id})`);
    return service;
  }

  async getService(serviceId: string): Promise<ServiceRecord> {
    return this.store.getService(serviceId);
  }

  async createKey(serviceId: string, owner: string, input: CreateKeyInput): Promise<KeyRecord> {
    const now = this.clock.now();
    const key = await this.store.updateService(serviceId, (service) =>
      issueKey(service, owner, input, now),
    );
    this.logger.log(`API key '${key.name}' created (${key.id}, sequence ${key.sequence})`);
    return key;
  }

  async getKey(serviceId: string, keyId: string, principal: string): Promise<KeyRecord> {
    const [service, key] = await Promise.all([
      this.store.getService(serviceId),
      this.store.getKey(keyId),
    ]);
    assertKeyBelongsTo(service, key);
    authorize(service, key, principal, 'OwnerOrAuthority');
    return key;
  }

  async listKeys(serviceId: string, principal: string): Promise<KeyRecord[]> {
    const service = await this.store.getService(serviceId);
    authorize(service, null, principal, 'Authority');
    return this.store.listKeys(serviceId);
  }

  async recordRequest(
    serviceId: string,
    keyId: string,
    principal: string,
  ): Promise<RecordRequestResult> {
    const now = this.clock.now();
    const result = await this.store.updateKey(serviceId, keyId, (service, key) =>
      recordRequest(service, key, principal, now),
    );
    this.logger.debug(
      `Request recorded for ${keyId}. Today: ${result.key.requestsToday}/${result.key.rateLimit}`,
    );
    return result;
  }

  async validateScope(serviceId: string, keyId: string, scope: string): Promise<KeyRecord> {
    const now = this.clock.now();
    const [service, key] = await Promise.all([
      this.store.getService(serviceId),
      this.store.getKey(keyId),
    ]);
    checkScope(service, key, scope, now);
    return key;
  }

  async revokeKey(serviceId: string, keyId: string, principal: string): Promise<KeyRecord> {
    const key = await this.store.updateKey(serviceId, keyId, (service, current) =>
      revokeKey(service, current, principal),
    );
    this.logger.log(`API key '${key.name}' has been revoked (${key.id})`);
    return key;
  }

  async reactivateKey(serviceId: string, keyId: string, principal: string): Promise<KeyRecord> {
    const now = this.clock.now();
    const key = await this.store.updateKey(serviceId, keyId, (service, current) =>
      reactivateKey(service, current, principal, now),
    );
    this.logger.log(`API key '${key.name}' has been reactivated (${key.id})`);
    return key;
  }

  async updateRateLimit(
    serviceId: string,
    keyId: string,
    principal: string,
    rateLimit: number,
  ): Promise<KeyRecord> {
    const key = await this.store.updateKey(serviceId, keyId, (service, current) =>
      changeRateLimit(service, current, principal, rateLimit),
    );
    this.logger.log(`Rate limit set to ${key.rateLimit} for key ${key.id}`);
    return key;
  }

  async updateScopes(
    serviceId: string,
    keyId: string,
    principal: string,
    scopes: string[],
  ): Promise<KeyRecord> {
    const key = await this.store.updateKey(serviceId, keyId, (service, current) =>
      replaceScopes(service, current, principal, scopes),
    );
    this.logger.log(`Scopes updated for key ${key.id}: ${key.scopes.join(', ')}`);
    return key;
  }

  async extendExpiration(
    serviceId: string,
    keyId: string,
    principal: string,
    expiresAt: number,
  ): Promise<KeyRecord> {
    const now = this.clock.now();
    const key = await this.store.updateKey(serviceId, keyId, (service, current) =>
      extendExpiration(service, current, principal, expiresAt, now),
    );
    this.logger.log(`Expiration for key ${key.id} set to ${expiresAt}`);
    return key;
  }
}
