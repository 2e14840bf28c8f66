import type { Response, NextFunction, RequestHandler } from 'express';
import type { AuthService } from '../modules/auth/auth.service';
import type { AuthRequest, AuthUser } from '../types/request.types';
import { UnauthorizedError } from '../utils/errors';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export const extractBearerToken = (header: string | undefined): string | null => {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match ? match[1] : null;
};

/**
 * Resolves `Authorization: Bearer <access token>` to `req.user`
 */
export const createAuthenticate = (authService: AuthService): RequestHandler => {
  return async (req: AuthRequest, _res: Response, next: NextFunction) => {
    try {
      const token = extractBearerToken(req.headers.authorization);
      if (!token) {
        throw new UnauthorizedError('Not authenticated');
      }

      req.user = await authService.authenticate(token);
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * The identity set by `authenticate`; throws when the route was mounted without it
 */
export const requireUser = (req: AuthRequest): AuthUser => {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
};
