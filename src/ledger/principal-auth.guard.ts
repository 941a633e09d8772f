import { timingSafeEqual } from 'node:crypto';

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { sha256Hex } from '../utils/hash';
import { RequestWithPrincipal } from './request';

type PrincipalCredential = {
  identity: string;
  tokenHash: Buffer;
};

/**
 * Verifies that the caller controls the identity it acts as. The ledger rules only compare
 * identities, so this is the single place a claimed identity is proven.
 */
@Injectable()
export class PrincipalAuthGuard implements CanActivate {
  private readonly credentials: PrincipalCredential[];

  constructor(private readonly configService: ConfigService) {
    this.credentials = this.parseCredentials(
      this.configService.get<string>('LEDGER_PRINCIPALS') ?? '',
    );
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithPrincipal>();
    if (this.credentials.length === 0) {
      throw new UnauthorizedException('No principals are configured');
    }

    const header = request.headers.authorization;
    const value = Array.isArray(header) ? header[0] : header;
    const token = this.extractBearer(value ?? '');
    if (!token) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const candidate = Buffer.from(sha256Hex(token), 'hex');
    const match = this.credentials.find((credential) =>
      timingSafeEqual(candidate, credential.tokenHash),
    );
    if (!match) {
      throw new UnauthorizedException('Invalid bearer token');
    }

    request.principal = match.identity;
    return true;
  }

  private parseCredentials(raw: string): PrincipalCredential[] {
    return raw
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .flatMap((entry) => {
        const [identity, token] = entry.split('=');
        if (!identity || !token) {
          return [];
        }
        return [{ identity, tokenHash: Buffer.from(sha256Hex(token), 'hex') }];
      });
  }

  private extractBearer(value: string): string | null {
    const [scheme, token] = value.split(' ');
    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
      return null;
    }

    return token;
  }
}
