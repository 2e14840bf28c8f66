import type { Response, NextFunction, RequestHandler } from 'express';
import type { CacheClient } from '../connections/redis/cache.client';
import type { AuthRequest } from '../types/request.types';
import { RateLimitedError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logging';

export interface RateLimitPolicy {
  name: string;
  windowSeconds: number;
  maxRequests: number;
}

const MINUTE = 60;

/**
 * Fixed-window budgets per endpoint
 */
export const rateLimitPolicies = {
  contactsList: { name: 'contacts:list', windowSeconds: MINUTE, maxRequests: 20 },
  contactsGet: { name: 'contacts:get', windowSeconds: MINUTE, maxRequests: 20 },
  contactsCreate: { name: 'contacts:create', windowSeconds: MINUTE, maxRequests: 5 },
  contactsUpdate: { name: 'contacts:update', windowSeconds: MINUTE, maxRequests: 10 },
  contactsDelete: { name: 'contacts:delete', windowSeconds: MINUTE, maxRequests: 10 },
  contactsSearch: { name: 'contacts:search', windowSeconds: MINUTE, maxRequests: 15 },
  contactsBirthdays: { name: 'contacts:birthdays', windowSeconds: MINUTE, maxRequests: 10 },
  avatarUpload: { name: 'users:avatar', windowSeconds: MINUTE, maxRequests: 5 },
  signup: { name: 'auth:signup', windowSeconds: 15 * MINUTE, maxRequests: 5 },
  login: { name: 'auth:login', windowSeconds: 15 * MINUTE, maxRequests: 5 },
  passwordReset: { name: 'auth:reset-password', windowSeconds: 15 * MINUTE, maxRequests: 5 },
  resendVerification: { name: 'auth:resend-verification', windowSeconds: MINUTE, maxRequests: 3 },
} satisfies Record<string, RateLimitPolicy>;

export type RateLimitFactory = (policy: RateLimitPolicy) => RequestHandler;

/**
 * User id when authenticated, client IP otherwise
 */
const getClientId = (req: AuthRequest): string => req.user?.id ?? req.ip ?? 'unknown';

/**
 * Redis-backed fixed-window limiter. Counters live under
 * `ratelimit:{policy}:{identity}` and expire with the window. When Redis is
 * unreachable requests pass through.
 */
export const createRateLimit = (client: CacheClient): RateLimitFactory => {
  const consume = async (key: string, windowSeconds: number): Promise<{ count: number; ttl: number }> => {
    const count = await client.incr(key);
    if (count === 1) {
      await client.expire(key, windowSeconds);
      return { count, ttl: windowSeconds };
    }

    let ttl = await client.ttl(key);
    if (ttl < 0) {
      // counter lost its expiry
      await client.expire(key, windowSeconds);
      ttl = windowSeconds;
    }
    return { count, ttl };
  };

  return (policy: RateLimitPolicy): RequestHandler => {
    return async (req: AuthRequest, res: Response, next: NextFunction) => {
      const clientId = getClientId(req);
      const key = `ratelimit:${policy.name}:${clientId}`;

      let usage: { count: number; ttl: number };
      try {
        usage = await consume(key, policy.windowSeconds);
      } catch (error) {
        logger.warn('[Rate Limit] Store unavailable, allowing request', {
          policy: policy.name,
          error: errorMessage(error),
        });
        next();
        return;
      }

      res.setHeader('X-RateLimit-Limit', policy.maxRequests.toString());
      res.setHeader('X-RateLimit-Remaining', Math.max(0, policy.maxRequests - usage.count).toString());
      res.setHeader('X-RateLimit-Reset', new Date(Date.now() + usage.ttl * 1000).toISOString());

      if (usage.count > policy.maxRequests) {
        logger.warn('[Rate Limit Exceeded]', {
          clientId,
          policy: policy.name,
          count: usage.count,
          limit: policy.maxRequests,
        });
        next(new RateLimitedError(usage.ttl));
        return;
      }

      next();
    };
  };
};
