import { truncatedSha256 } from '../utils/hash';

export function deriveServiceId(authority: string): string {
  return truncatedSha256(`service:${authority}`);
}

export function deriveKeyId(serviceId: string, owner: string, sequence: number): string {
  return truncatedSha256(`key:${serviceId}:${owner}:${sequence}`);
}
