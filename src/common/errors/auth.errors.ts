import { HttpException, HttpStatus } from '@nestjs/common';

export const AUTH_ERROR_KINDS = [
  'InvalidToken',
  'InactiveUser',
  'SessionExpired',
  'SessionRevoked',
  'AdminRequired',
  'SelfImpersonationForbidden',
  'TargetUserInactive',
  'ReasonRequired',
  'NotAuthorized',
  'NotFound',
  'Unauthorized',
] as const;

export type AuthErrorKind = (typeof AUTH_ERROR_KINDS)[number];

export interface AuthErrorBody {
  statusCode: number;
  kind: AuthErrorKind;
  message: string;
}

/**
 * Expected, typed failure of the session core. Each subclass pins a stable
 * machine-readable `kind` and the HTTP status it maps to.
 */
export abstract class AuthError extends HttpException {
  protected constructor(
    readonly kind: AuthErrorKind,
    status: HttpStatus,
    message: string,
  ) {
    super({ statusCode: status, kind, message } satisfies AuthErrorBody, status);
  }
}

export class InvalidTokenError extends AuthError {
  constructor(message = 'Token is invalid or expired') {
    super('InvalidToken', HttpStatus.UNAUTHORIZED, message);
  }
}

export class InactiveUserError extends AuthError {
  constructor(message = 'Inactive user') {
    super('InactiveUser', HttpStatus.BAD_REQUEST, message);
  }
}

export class SessionExpiredError extends AuthError {
  constructor(message = 'Session expired') {
    super('SessionExpired', HttpStatus.UNAUTHORIZED, message);
  }
}

export class SessionRevokedError extends AuthError {
  constructor(message = 'Session has been revoked') {
    super('SessionRevoked', HttpStatus.UNAUTHORIZED, message);
  }
}

export class AdminRequiredError extends AuthError {
  constructor(message = 'Administrator privileges required') {
    super('AdminRequired', HttpStatus.FORBIDDEN, message);
  }
}

export class SelfImpersonationForbiddenError extends AuthError {
  constructor(message = 'Administrators cannot impersonate themselves') {
    super('SelfImpersonationForbidden', HttpStatus.FORBIDDEN, message);
  }
}

export class TargetUserInactiveError extends AuthError {
  constructor(message = 'Target user not found or inactive') {
    super('TargetUserInactive', HttpStatus.NOT_FOUND, message);
  }
}

export class ReasonRequiredError extends AuthError {
  constructor(message = 'A reason is required to impersonate a user') {
    super('ReasonRequired', HttpStatus.BAD_REQUEST, message);
  }
}

export class NotAuthorizedError extends AuthError {
  constructor(message = 'Not authorized to perform this action') {
    super('NotAuthorized', HttpStatus.FORBIDDEN, message);
  }
}

export class NotFoundError extends AuthError {
  constructor(message = 'Not found') {
    super('NotFound', HttpStatus.NOT_FOUND, message);
  }
}

/**
 * Umbrella failure for the identity-resolution path. It never says whether
 * the token was malformed, expired or revoked.
 */
export class UnauthorizedError extends AuthError {
  constructor(message = 'Could not validate credentials') {
    super('Unauthorized', HttpStatus.UNAUTHORIZED, message);
  }
}
