import { deriveKeyId, deriveServiceId } from './ledger-ids';
import { LedgerException } from './ledger.errors';
import { admitRequest, saturatingDecrement, saturatingIncrement } from './rate-limit';
import {
  CreateKeyInput,
  CreateServiceInput,
  Expiration,
  KeyRecord,
  LedgerTransition,
  RecordRequestResult,
  Role,
  ServiceRecord,
} from './types';

export const MAX_NAME_LENGTH = 32;
export const MAX_SCOPES = 8;
export const MAX_SCOPE_LENGTH = 16;
export const WILDCARD_SCOPE = '*';

// Lengths are counted in UTF-8 bytes.
function byteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

export function assertName(name: string): void {
  if (byteLength(name) > MAX_NAME_LENGTH) {
    throw new LedgerException('NameTooLong');
  }
}

export function assertScopes(scopes: readonly string[]): void {
  if (scopes.length > MAX_SCOPES) {
    throw new LedgerException('TooManyScopes');
  }
  for (const scope of scopes) {
    if (byteLength(scope) > MAX_SCOPE_LENGTH) {
      throw new LedgerException('ScopeTooLong');
    }
  }
}

function assertFutureExpiration(expiresAt: number, now: number): void {
  if (!(expiresAt > now)) {
    throw new LedgerException('ExpirationInPast');
  }
}

export function isExpired(expiration: Expiration, now: number): boolean {
  return expiration.kind === 'at' && now >= expiration.timestamp;
}

export function hasScope(scopes: readonly string[], requiredScope: string): boolean {
  return scopes.some((scope) => scope === requiredScope || scope === WILDCARD_SCOPE);
}

/** Capability check: the authority holds every role, the key owner only OwnerOrAuthority. */
export function isAuthorized(
  service: ServiceRecord,
  key: KeyRecord | null,
  principal: string,
  role: Role,
): boolean {
  if (principal === service.authority) {
    return true;
  }

  return role === 'OwnerOrAuthority' && key !== null && principal === key.owner;
}

export function authorize(
  service: ServiceRecord,
  key: KeyRecord | null,
  principal: string,
  role: Role,
): void {
  if (!isAuthorized(service, key, principal, role)) {
    throw new LedgerException('Unauthorized');
  }
}

export function assertKeyBelongsTo(service: ServiceRecord, key: KeyRecord): void {
  if (key.service !== service.id) {
    throw new LedgerException('ServiceMismatch');
  }
}

function assertUsable(key: KeyRecord, now: number): void {
  if (!key.isActive) {
    throw new LedgerException('KeyInactive');
  }
  if (isExpired(key.expiration, now)) {
    throw new LedgerException('KeyExpired');
  }
}

export function initializeService(authority: string, input: CreateServiceInput): ServiceRecord {
  assertName(input.name);

  return {
    id: deriveServiceId(authority),
    authority,
    name: input.name,
    defaultRateLimit: input.defaultRateLimit,
    totalKeys: 0,
    activeKeys: 0,
  };
}

export function issueKey(
  service: ServiceRecord,
  owner: string,
  input: CreateKeyInput,
  now: number,
): LedgerTransition<KeyRecord> {
  assertName(input.name);
  assertScopes(input.scopes);
  if (input.expiresAt !== undefined) {
    assertFutureExpiration(input.expiresAt, now);
  }

  const sequence = service.totalKeys;
  const key: KeyRecord = {
    id: deriveKeyId(service.id, owner, sequence),
    service: service.id,
    owner,
    sequence,
    name: input.name,
    scopes: [...input.scopes],
    rateLimit: input.rateLimit ?? service.defaultRateLimit,
    requestsToday: 0,
    totalRequests: 0,
    lastRequestDay: 0,
    createdAt: now,
    expiration:
      input.expiresAt === undefined
        ? { kind: 'never' }
        : { kind: 'at', timestamp: input.expiresAt },
    isActive: true,
  };

  return {
    writes: {
      key,
      service: {
        ...service,
        totalKeys: sequence + 1,
        activeKeys: saturatingIncrement(service.activeKeys),
      },
    },
    result: key,
  };
}

export function recordRequest(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
  now: number,
): LedgerTransition<RecordRequestResult> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'Authority');
  assertUsable(key, now);

  const decision = admitRequest(key, key.rateLimit, now);
  if (!decision.allowed) {
    throw new LedgerException('RateLimitExceeded', {
      limit: decision.status.limit,
      resetAt: decision.status.resetAt,
      retryAfter: decision.status.retryAfter,
    });
  }

  const updated: KeyRecord = { ...key, ...decision.usage };
  return {
    writes: { key: updated },
    result: { key: updated, rateLimit: decision.status },
  };
}

export function checkScope(
  service: ServiceRecord,
  key: KeyRecord,
  requiredScope: string,
  now: number,
): void {
  assertKeyBelongsTo(service, key);
  assertUsable(key, now);
  if (!hasScope(key.scopes, requiredScope)) {
    throw new LedgerException('InsufficientPermissions');
  }
}

export function revokeKey(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
): LedgerTransition<KeyRecord> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'OwnerOrAuthority');
  if (!key.isActive) {
    throw new LedgerException('KeyAlreadyRevoked');
  }

  const updated: KeyRecord = { ...key, isActive: false };
  return {
    writes: {
      key: updated,
      service: { ...service, activeKeys: saturatingDecrement(service.activeKeys) },
    },
    result: updated,
  };
}

export function reactivateKey(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
  now: number,
): LedgerTransition<KeyRecord> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'OwnerOrAuthority');
  if (key.isActive) {
    throw new LedgerException('KeyAlreadyActive');
  }
  if (isExpired(key.expiration, now)) {
    throw new LedgerException('KeyExpired');
  }

  const updated: KeyRecord = { ...key, isActive: true };
  return {
    writes: {
      key: updated,
      service: {
        ...service,
        activeKeys: Math.min(saturatingIncrement(service.activeKeys), service.totalKeys),
      },
    },
    result: updated,
  };
}

/** Overwrites without clamping; `requestsToday` may already exceed the new limit. */
export function changeRateLimit(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
  rateLimit: number,
): LedgerTransition<KeyRecord> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'Authority');

  const updated: KeyRecord = { ...key, rateLimit };
  return { writes: { key: updated }, result: updated };
}

export function replaceScopes(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
  scopes: readonly string[],
): LedgerTransition<KeyRecord> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'Authority');
  assertScopes(scopes);

  const updated: KeyRecord = { ...key, scopes: [...scopes] };
  return { writes: { key: updated }, result: updated };
}

/** Replaces the expiration; an earlier timestamp is accepted as long as it is still ahead. */
export function extendExpiration(
  service: ServiceRecord,
  key: KeyRecord,
  principal: string,
  expiresAt: number,
  now: number,
): LedgerTransition<KeyRecord> {
  assertKeyBelongsTo(service, key);
  authorize(service, key, principal, 'Authority');
  assertFutureExpiration(expiresAt, now);

  const updated: KeyRecord = { ...key, expiration: { kind: 'at', timestamp: expiresAt } };
  return { writes: { key: updated }, result: updated };
}
