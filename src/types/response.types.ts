import type { UserRole } from '../connections/db/models/user.model';

export interface UserResponse {
  id: string;
  email: string;
  name: string;
  role: UserRole;
  is_verified: boolean;
  avatar_url: string | null;
  created_at: string;
}

export interface TokenPairResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  expires_in: number;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
}
