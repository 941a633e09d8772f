import { RateLimitStatus } from './types';

export const SECONDS_PER_DAY = 86_400;

export type DailyUsage = {
  requestsToday: number;
  totalRequests: number;
  lastRequestDay: number;
};

export type UsageDecision =
  | { allowed: true; usage: DailyUsage; status: RateLimitStatus }
  | { allowed: false; status: RateLimitStatus };

/** Floor division, so times before the epoch land in negative buckets. */
export function dayBucket(unixSeconds: number): number {
  return Math.floor(unixSeconds / SECONDS_PER_DAY);
}

export function saturatingIncrement(value: number): number {
  return value >= Number.MAX_SAFE_INTEGER ? Number.MAX_SAFE_INTEGER : value + 1;
}

export function saturatingDecrement(value: number): number {
  return value <= 0 ? 0 : value - 1;
}

/**
 * Day-bucket admission for one request. Rollover is lazy: the counter resets on the first
 * request seen in a later bucket, however many buckets were skipped. `lastRequestDay` never
 * moves backwards, so `resetAt` follows the later of the current and the recorded bucket.
 * A rejected request leaves the usage untouched.
 */
export function admitRequest(usage: DailyUsage, rateLimit: number, now: number): UsageDecision {
  const currentDay = dayBucket(now);
  const rolledOver = currentDay > usage.lastRequestDay;
  const requestsToday = rolledOver ? 0 : usage.requestsToday;
  const lastRequestDay = rolledOver ? currentDay : usage.lastRequestDay;
  // The counter only clears once the clock passes the bucket it was last counted in.
  const resetAt = (lastRequestDay + 1) * SECONDS_PER_DAY;
  const retryAfter = Math.max(1, resetAt - now);

  if (!(requestsToday < rateLimit)) {
    return {
      allowed: false,
      status: { limit: rateLimit, remaining: 0, resetAt, retryAfter },
    };
  }

  const next: DailyUsage = {
    requestsToday: requestsToday + 1,
    totalRequests: saturatingIncrement(usage.totalRequests),
    lastRequestDay,
  };

  return {
    allowed: true,
    usage: next,
    status: {
      limit: rateLimit,
      remaining: Math.max(0, rateLimit - next.requestsToday),
      resetAt,
      retryAfter,
    },
  };
}
