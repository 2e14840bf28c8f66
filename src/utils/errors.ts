/**
 * Application error taxonomy. Every error that should reach the client with a
 * specific status extends AppError; anything else becomes a 500.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'INVALID_TOKEN'
  | 'TOKEN_EXPIRED'
  | 'WRONG_TOKEN_PURPOSE'
  | 'TOKEN_REVOKED'
  | 'INVALID_CREDENTIALS'
  | 'NOT_VERIFIED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'EMAIL_TAKEN'
  | 'ALREADY_VERIFIED'
  | 'RATE_LIMITED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  readonly status: number;
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(status: number, code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid request data', details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Could not validate credentials', code: ErrorCode = 'UNAUTHORIZED') {
    super(401, code, message);
  }
}

export type TokenFailure = 'invalid' | 'expired' | 'wrong-purpose' | 'revoked';

const TOKEN_FAILURES: Record<TokenFailure, { code: ErrorCode; message: string }> = {
  invalid: { code: 'INVALID_TOKEN', message: 'Invalid token' },
  expired: { code: 'TOKEN_EXPIRED', message: 'Token has expired' },
  'wrong-purpose': { code: 'WRONG_TOKEN_PURPOSE', message: 'Token cannot be used for this operation' },
  revoked: { code: 'TOKEN_REVOKED', message: 'Token has been revoked' },
};

export class TokenError extends UnauthorizedError {
  readonly reason: TokenFailure;

  constructor(reason: TokenFailure) {
    super(TOKEN_FAILURES[reason].message, TOKEN_FAILURES[reason].code);
    this.reason = reason;
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Incorrect email or password', 'INVALID_CREDENTIALS');
  }
}

export class NotVerifiedError extends AppError {
  constructor() {
    super(403, 'NOT_VERIFIED', 'Email not confirmed');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(403, 'FORBIDDEN', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(404, 'NOT_FOUND', message);
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Resource already exists', code: ErrorCode = 'CONFLICT') {
    super(409, code, message);
  }
}

export class RateLimitedError extends AppError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message = 'Too many requests') {
    super(429, 'RATE_LIMITED', message, { retryAfter: retryAfterSeconds });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(service: string, status = 503) {
    super(status, 'UPSTREAM_UNAVAILABLE', `${service} is temporarily unavailable`);
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
