export type Expiration = { kind: 'never' } | { kind: 'at'; timestamp: number };

export type ServiceRecord = {
  id: string;
  authority: string;
  name: string;
  defaultRateLimit: number;
  totalKeys: number;
  activeKeys: number;
};

export type KeyRecord = {
  id: string;
  service: string;
  owner: string;
  sequence: number;
  name: string;
  scopes: string[];
  rateLimit: number;
  requestsToday: number;
  totalRequests: number;
  lastRequestDay: number;
  createdAt: number;
  expiration: Expiration;
  isActive: boolean;
};

export type Role = 'Authority' | 'OwnerOrAuthority';

export type CreateServiceInput = {
  name: string;
  defaultRateLimit: number;
};

export type CreateKeyInput = {
  name: string;
  scopes: string[];
  rateLimit?: number;
  expiresAt?: number;
};

export type RateLimitStatus = {
  limit: number;
  remaining: number;
  resetAt: number;
  retryAfter: number;
};

export type RecordRequestResult = {
  key: KeyRecord;
  rateLimit: RateLimitStatus;
};

/** Records a single store call replaces; `key` may be a record that does not exist yet. */
export type LedgerWrite = {
  service?: ServiceRecord;
  key?: KeyRecord;
};

export type LedgerTransition<T> = {
  writes: LedgerWrite;
  result: T;
};
