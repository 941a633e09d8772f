import { HttpException, HttpStatus } from '@nestjs/common';

export type LedgerErrorCode =
  | 'NameTooLong'
  | 'TooManyScopes'
  | 'ScopeTooLong'
  | 'ExpirationInPast'
  | 'KeyInactive'
  | 'KeyExpired'
  | 'KeyAlreadyRevoked'
  | 'KeyAlreadyActive'
  | 'RateLimitExceeded'
  | 'Unauthorized'
  | 'InsufficientPermissions'
  | 'ServiceMismatch'
  | 'ServiceNotFound'
  | 'KeyNotFound'
  | 'ServiceAlreadyExists'
  | 'KeyAlreadyExists'
  | 'ConcurrentModification';

const ERRORS: Record<LedgerErrorCode, { status: HttpStatus; message: string }> = {
  NameTooLong: { status: HttpStatus.BAD_REQUEST, message: 'Name exceeds maximum length' },
  TooManyScopes: { status: HttpStatus.BAD_REQUEST, message: 'Too many scopes specified' },
  ScopeTooLong: { status: HttpStatus.BAD_REQUEST, message: 'Scope name exceeds maximum length' },
  ExpirationInPast: {
    status: HttpStatus.BAD_REQUEST,
    message: 'Expiration date must be in the future',
  },
  KeyInactive: { status: HttpStatus.FORBIDDEN, message: 'API key is not active' },
  KeyExpired: { status: HttpStatus.FORBIDDEN, message: 'API key has expired' },
  KeyAlreadyRevoked: { status: HttpStatus.CONFLICT, message: 'API key is already revoked' },
  KeyAlreadyActive: { status: HttpStatus.CONFLICT, message: 'API key is already active' },
  RateLimitExceeded: { status: HttpStatus.TOO_MANY_REQUESTS, message: 'Rate limit exceeded' },
  Unauthorized: { status: HttpStatus.FORBIDDEN, message: 'Unauthorized' },
  InsufficientPermissions: {
    status: HttpStatus.FORBIDDEN,
    message: 'Insufficient permissions for this scope',
  },
  ServiceMismatch: { status: HttpStatus.BAD_REQUEST, message: 'Service mismatch' },
  ServiceNotFound: { status: HttpStatus.NOT_FOUND, message: 'Service not found' },
  KeyNotFound: { status: HttpStatus.NOT_FOUND, message: 'API key not found' },
  ServiceAlreadyExists: {
    status: HttpStatus.CONFLICT,
    message: 'Service already exists for this authority',
  },
  KeyAlreadyExists: { status: HttpStatus.CONFLICT, message: 'API key already exists' },
  ConcurrentModification: {
    status: HttpStatus.CONFLICT,
    message: 'Record changed concurrently; retry the operation',
  },
};

export class LedgerException extends HttpException {
  constructor(
    readonly code: LedgerErrorCode,
    readonly details?: Record<string, unknown>,
  ) {
    super(
      { statusCode: ERRORS[code].status, error: code, message: ERRORS[code].message, ...details },
      ERRORS[code].status,
    );
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerException {
  return error instanceof LedgerException && (code === undefined || error.code === code);
}
