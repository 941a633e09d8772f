import { createHash } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

export function truncatedSha256(value: string, length = 32): string {
  return sha256Hex(value).substring(0, length);
}

/** Record keys and ids go to logs only in this form. */
export function hashKeyForLogging(key: string): string {
  return truncatedSha256(key, 16);
}
