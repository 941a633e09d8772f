import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Put,
  Req,
  Res,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';

import { isLedgerError } from './ledger.errors';
import { LedgerService } from './ledger.service';
import { PrincipalAuthGuard } from './principal-auth.guard';
import { RequestWithPrincipal } from './request';
import { CreateKeyInput, CreateServiceInput, KeyRecord, RateLimitStatus } from './types';

type CreateServiceBody = {
  name?: unknown;
  defaultRateLimit?: unknown;
};

type CreateKeyBody = {
  name?: unknown;
  scopes?: unknown;
  rateLimit?: unknown;
  expiresAt?: unknown;
};

type LedgerAction =
  | 'create_service'
  | 'get_service'
  | 'create_key'
  | 'list_keys'
  | 'get_key'
  | 'record_request'
  | 'validate_scope'
  | 'revoke'
  | 'reactivate'
  | 'update_rate_limit'
  | 'update_scopes'
  | 'extend_expiration';

export type KeyView = Omit<KeyRecord, 'expiration'> & { expiresAt: number | null };

@Controller('services')
@UseGuards(PrincipalAuthGuard)
export class LedgerController {
  private readonly logger = new Logger(LedgerController.name);

  constructor(private readonly ledgerService: LedgerService) {}

  @Post()
  async createService(
    @Req() request: RequestWithPrincipal,
    @Body() body: CreateServiceBody,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const input = this.parseCreateServiceBody(body);

    return this.audited(request, 'create_service', {}, async () => {
      const service = await this.ledgerService.createService(principal, input);
      return { result: service, target: { serviceId: service.id } };
    });
  }

  @Get(':serviceId')
  async getService(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
  ): Promise<unknown> {
    const id = this.parseId(serviceId, 'serviceId');

    return this.audited(request, 'get_service', { serviceId: id }, async () => ({
      result: await this.ledgerService.getService(id),
    }));
  }

  @Post(':serviceId/keys')
  async createKey(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Body() body: CreateKeyBody,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const id = this.parseId(serviceId, 'serviceId');
    const input = this.parseCreateKeyBody(body);

    return this.audited(request, 'create_key', { serviceId: id }, async () => {
      const key = await this.ledgerService.createKey(id, principal, input);
      return { result: this.toKeyView(key), target: { keyId: key.id } };
    });
  }

  @Get(':serviceId/keys')
  async listKeys(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const id = this.parseId(serviceId, 'serviceId');

    return this.audited(request, 'list_keys', { serviceId: id }, async () => {
      const keys = await this.ledgerService.listKeys(id, principal);
      return {
        result: { items: keys.map((key) => this.toKeyView(key)) },
        target: { count: keys.length },
      };
    });
  }

  @Get(':serviceId/keys/:keyId')
  async getKey(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);

    return this.audited(request, 'get_key', target, async () => ({
      result: this.toKeyView(
        await this.ledgerService.getKey(target.serviceId, target.keyId, principal),
      ),
    }));
  }

  @Post(':serviceId/keys/:keyId/requests')
  @HttpCode(HttpStatus.OK)
  async recordRequest(
    @Req() request: RequestWithPrincipal,
    @Res({ passthrough: true }) reply: FastifyReply,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);

    return this.audited(request, 'record_request', target, async () => {
      try {
        const { key, rateLimit } = await this.ledgerService.recordRequest(
          target.serviceId,
          target.keyId,
          principal,
        );
        this.applyRateLimitHeaders(reply, rateLimit);
        return { result: { key: this.toKeyView(key), rateLimit } };
      } catch (error) {
        if (isLedgerError(error, 'RateLimitExceeded')) {
          reply.header('x-ratelimit-limit', String(error.details?.limit));
          reply.header('x-ratelimit-remaining', '0');
          reply.header('x-ratelimit-reset', String(error.details?.resetAt));
          reply.header('retry-after', String(error.details?.retryAfter));
        }
        throw error;
      }
    });
  }

  @Post(':serviceId/keys/:keyId/validate')
  @HttpCode(HttpStatus.OK)
  async validateScope(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
    @Body() body: { scope?: unknown },
  ): Promise<unknown> {
    const target = this.parseTarget(serviceId, keyId);
    const scope = this.requireString(body?.scope, 'scope');

    return this.audited(request, 'validate_scope', { ...target, scope }, async () => {
      await this.ledgerService.validateScope(target.serviceId, target.keyId, scope);
      return { result: { ok: true, scope } };
    });
  }

  @Post(':serviceId/keys/:keyId/revoke')
  @HttpCode(HttpStatus.OK)
  async revoke(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);

    return this.audited(request, 'revoke', target, async () => ({
      result: this.toKeyView(
        await this.ledgerService.revokeKey(target.serviceId, target.keyId, principal),
      ),
    }));
  }

  @Post(':serviceId/keys/:keyId/reactivate')
  @HttpCode(HttpStatus.OK)
  async reactivate(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);

    return this.audited(request, 'reactivate', target, async () => ({
      result: this.toKeyView(
        await this.ledgerService.reactivateKey(target.serviceId, target.keyId, principal),
      ),
    }));
  }

  @Put(':serviceId/keys/:keyId/rate-limit')
  async updateRateLimit(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
    @Body() body: { rateLimit?: unknown },
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);
    const rateLimit = this.requireUnsigned(body?.rateLimit, 'rateLimit');

    return this.audited(request, 'update_rate_limit', { ...target, rateLimit }, async () => ({
      result: this.toKeyView(
        await this.ledgerService.updateRateLimit(
          target.serviceId,
          target.keyId,
          principal,
          rateLimit,
        ),
      ),
    }));
  }

  @Put(':serviceId/keys/:keyId/scopes')
  async updateScopes(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
    @Body() body: { scopes?: unknown },
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);
    const scopes = this.parseScopes(body?.scopes);

    return this.audited(request, 'update_scopes', target, async () => ({
      result: this.toKeyView(
        await this.ledgerService.updateScopes(target.serviceId, target.keyId, principal, scopes),
      ),
    }));
  }

  @Put(':serviceId/keys/:keyId/expiration')
  async extendExpiration(
    @Req() request: RequestWithPrincipal,
    @Param('serviceId') serviceId: string,
    @Param('keyId') keyId: string,
    @Body() body: { expiresAt?: unknown },
  ): Promise<unknown> {
    const principal = this.principalOf(request);
    const target = this.parseTarget(serviceId, keyId);
    const expiresAt = this.requireTimestamp(body?.expiresAt, 'expiresAt');

    return this.audited(request, 'extend_expiration', { ...target, expiresAt }, async () => ({
      result: this.toKeyView(
        await this.ledgerService.extendExpiration(
          target.serviceId,
          target.keyId,
          principal,
          expiresAt,
        ),
      ),
    }));
  }

  private async audited<T>(
    request: RequestWithPrincipal,
    action: LedgerAction,
    target: Record<string, unknown>,
    operation: () => Promise<{ result: T; target?: Record<string, unknown> }>,
  ): Promise<T> {
    try {
      const outcome = await operation();
      this.audit(request, action, 'ok', { ...target, ...outcome.target });
      return outcome.result;
    } catch (error) {
      this.audit(request, action, 'error', { ...target, reason: this.errorReason(error) });
      throw error;
    }
  }

  private parseCreateServiceBody(body: CreateServiceBody): CreateServiceInput {
    return {
      name: this.requireString(body?.name, 'name'),
      defaultRateLimit: this.requireUnsigned(body?.defaultRateLimit, 'defaultRateLimit'),
    };
  }

  private parseCreateKeyBody(body: CreateKeyBody): CreateKeyInput {
    const input: CreateKeyInput = {
      name: this.requireString(body?.name, 'name'),
      scopes: this.parseScopes(body?.scopes),
    };

    if (body?.rateLimit !== undefined && body.rateLimit !== null) {
      input.rateLimit = this.requireUnsigned(body.rateLimit, 'rateLimit');
    }
    if (body?.expiresAt !== undefined && body.expiresAt !== null) {
      input.expiresAt = this.requireTimestamp(body.expiresAt, 'expiresAt');
    }

    return input;
  }

  private parseTarget(serviceId: string, keyId: string): { serviceId: string; keyId: string } {
    return {
      serviceId: this.parseId(serviceId, 'serviceId'),
      keyId: this.parseId(keyId, 'keyId'),
    };
  }

  private parseId(value: string, fieldName: string): string {
    const normalized = value?.trim();
    if (!normalized) {
      throw new BadRequestException(`${fieldName} is required`);
    }

    return normalized;
  }

  private parseScopes(value: unknown): string[] {
    if (!Array.isArray(value) || !value.every((scope) => typeof scope === 'string')) {
      throw new BadRequestException('scopes must be an array of strings');
    }

    return value;
  }

  private requireString(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }

    return value;
  }

  private requireUnsigned(value: unknown, fieldName: string): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw new BadRequestException(`${fieldName} must be a non-negative integer`);
    }

    return value;
  }

  private requireTimestamp(value: unknown, fieldName: string): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
      throw new BadRequestException(`${fieldName} must be an integer unix timestamp`);
    }

    return value;
  }

  private principalOf(request: RequestWithPrincipal): string {
    if (!request.principal) {
      throw new UnauthorizedException('Principal not authenticated');
    }

    return request.principal;
  }

  private toKeyView(key: KeyRecord): KeyView {
    const { expiration, ...rest } = key;
    return {
      ...rest,
      expiresAt: expiration.kind === 'at' ? expiration.timestamp : null,
    };
  }

  private applyRateLimitHeaders(reply: FastifyReply, status: RateLimitStatus): void {
    reply.header('x-ratelimit-limit', String(status.limit));
    reply.header('x-ratelimit-remaining', String(status.remaining));
    reply.header('x-ratelimit-reset', String(status.resetAt));
  }

  private audit(
    request: RequestWithPrincipal,
    action: LedgerAction,
    result: 'ok' | 'error',
    details?: Record<string, unknown>,
  ): void {
    const requestIdHeader = request.headers['x-request-id'];
    const requestId = Array.isArray(requestIdHeader) ? requestIdHeader[0] : requestIdHeader;
    const payload = {
      event: 'ledger_audit',
      action,
      result,
      principal: request.principal ?? 'unknown',
      ip: request.ip ?? 'unknown',
      requestId: requestId ?? null,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }

  private errorReason(error: unknown): string {
    if (isLedgerError(error)) {
      return error.code;
    }
    if (error instanceof Error) {
      return error.name;
    }
    return 'UnknownError';
  }
}
