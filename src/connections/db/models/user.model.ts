// User Model - Based on migration 20260101_000001_create_users_table

export type UserRole = 'user' | 'admin';

export interface User {
  id: string; // UUID
  email: string; // stored lower-cased
  password_hash: string;
  name: string;
  role: UserRole;
  is_verified: boolean;
  avatar_url: string | null;
  token_version: number; // bumped on password reset, embedded in access tokens as `ver`
  created_at: Date;
  updated_at: Date;
}

export interface CreateUserInput {
  email: string;
  password_hash: string;
  name: string;
  role?: UserRole;
}
