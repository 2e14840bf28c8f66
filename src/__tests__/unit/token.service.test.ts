/**
 * Unit Tests: TokenService
 */

import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../../modules/auth/token.service';
import { TokenError } from '../../utils/errors';
import { createClock } from '../mocks/app.mock';

const captureTokenError = (fn: () => unknown): TokenError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) return error;
    throw error;
  }
  throw new Error('Expected a TokenError');
};

describe('TokenService', () => {
  const clock = createClock('2026-01-01T00:00:00Z');
  const tokens = new TokenService({ secret: 'test-secret', algorithm: 'HS256', now: clock.now });

  it('issues tokens whose claims round-trip through validate', () => {
    const issued = tokens.issue('user-1', 'access', 1800, { ver: 3 });
    const claims = tokens.validate(issued.token, 'access');

    expect(claims.sub).toBe('user-1');
    expect(claims.purpose).toBe('access');
    expect(claims.jti).toBe(issued.jti);
    expect(claims.ver).toBe(3);
    expect(claims.exp - claims.iat).toBe(1800);
    expect(issued.expiresAt.toISOString()).toBe('2026-01-01T00:30:00.000Z');
  });

  it('gives every token its own jti', () => {
    const a = tokens.issue('user-1', 'refresh', 60);
    const b = tokens.issue('user-1', 'refresh', 60);
    expect(a.jti).not.toBe(b.jti);
  });

  it('rejects a token presented for another purpose', () => {
    const verification = tokens.issue('user-1', 'verify-email', 3600);
    const error = captureTokenError(() => tokens.validate(verification.token, 'access'));

    expect(error.reason).toBe('wrong-purpose');
    expect(error.code).toBe('WRONG_TOKEN_PURPOSE');
    expect(error.status).toBe(401);
  });

  it('rejects an access token where a refresh token is required', () => {
    const access = tokens.issue('user-1', 'access', 1800, { ver: 0 });
    expect(captureTokenError(() => tokens.validate(access.token, 'refresh')).reason).toBe('wrong-purpose');
  });

  it('reports expiry against the injected clock', () => {
    const local = createClock('2026-01-01T00:00:00Z');
    const service = new TokenService({ secret: 'test-secret', algorithm: 'HS256', now: local.now });
    const issued = service.issue('user-1', 'reset-password', 3600);

    local.advance(3599);
    expect(service.validate(issued.token, 'reset-password').sub).toBe('user-1');

    local.advance(2);
    const error = captureTokenError(() => service.validate(issued.token, 'reset-password'));
    expect(error.reason).toBe('expired');
    expect(error.code).toBe('TOKEN_EXPIRED');
  });

  it('rejects tokens signed with another secret', () => {
    const other = new TokenService({ secret: 'other-secret', algorithm: 'HS256', now: clock.now });
    const forged = other.issue('user-1', 'access', 1800, { ver: 0 });

    expect(captureTokenError(() => tokens.validate(forged.token, 'access')).reason).toBe('invalid');
  });

  it('rejects garbage', () => {
    expect(captureTokenError(() => tokens.validate('not-a-jwt', 'access')).reason).toBe('invalid');
  });

  it('rejects a correctly signed token without the purpose claim', () => {
    const iat = tokens.nowSeconds();
    const token = jwt.sign({ sub: 'user-1', jti: 'abc', iat, exp: iat + 60 }, 'test-secret', {
      algorithm: 'HS256',
    });

    expect(captureTokenError(() => tokens.validate(token, 'access')).reason).toBe('invalid');
  });

  it('only accepts the configured algorithm', () => {
    const iat = tokens.nowSeconds();
    const token = jwt.sign({ sub: 'user-1', purpose: 'access', jti: 'abc', iat, exp: iat + 60 }, 'test-secret', {
      algorithm: 'HS512',
    });

    expect(captureTokenError(() => tokens.validate(token, 'access')).reason).toBe('invalid');
  });
});
