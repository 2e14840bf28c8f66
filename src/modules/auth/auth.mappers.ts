import type { User } from '../../connections/db/models/user.model';
import type { AuthUser } from '../../types/request.types';
import type { UserResponse } from '../../types/response.types';

export const toAuthUser = (user: User): AuthUser => ({
  id: user.id,
  email: user.email,
  name: user.name,
  role: user.role,
  is_verified: user.is_verified,
  avatar_url: user.avatar_url,
  token_version: user.token_version,
  created_at: user.created_at.toISOString(),
});

export const toUserResponse = (user: AuthUser): UserResponse => ({
  id: user.id,
  email: user.email,
  name: user.name,
  role: user.role,
  is_verified: user.is_verified,
  avatar_url: user.avatar_url,
  created_at: user.created_at,
});
