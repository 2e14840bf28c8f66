// AuthToken Model - Based on migration 20260101_000002_create_auth_tokens_table
// Access tokens are stateless and never stored here.

export type StoredTokenPurpose = 'refresh' | 'verify-email' | 'reset-password';

export interface AuthToken {
  id: string; // JWT `jti`
  user_id: string;
  purpose: StoredTokenPurpose;
  expires_at: Date;
  is_used: boolean;
  used_at: Date | null;
  created_at: Date;
}

export interface CreateAuthTokenInput {
  id: string;
  user_id: string;
  purpose: StoredTokenPurpose;
  expires_at: Date;
}
