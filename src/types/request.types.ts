import type { Request } from 'express';
import { z } from 'zod';

/**
 * Snapshot of the authenticated user, resolved once per request by the auth
 * middleware and cached under `user:{id}`
 */
export const authUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  role: z.enum(['user', 'admin']),
  is_verified: z.boolean(),
  avatar_url: z.string().nullable(),
  token_version: z.number().int(),
  created_at: z.string(),
});

export type AuthUser = z.infer<typeof authUserSchema>;

/**
 * Request with the identity resolved by `authenticate`
 */
export interface AuthRequest extends Request {
  user?: AuthUser;
}

export interface PaginationQuery {
  page: number;
  limit: number;
}

export interface SearchQuery extends PaginationQuery {
  q: string;
}
