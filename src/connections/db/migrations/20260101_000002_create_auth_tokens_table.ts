import type { DatabaseClient } from '../connection';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: DatabaseClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS auth_tokens (
        -- the JWT jti
        id UUID PRIMARY KEY,
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        purpose VARCHAR(20) NOT NULL CHECK (purpose IN ('refresh', 'verify-email', 'reset-password')),
        expires_at TIMESTAMPTZ NOT NULL,
        is_used BOOLEAN NOT NULL DEFAULT FALSE,
        used_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_auth_tokens_user_purpose
      ON auth_tokens (user_id, purpose) WHERE is_used = FALSE
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_auth_tokens_expires_at ON auth_tokens (expires_at)
    `);
  },

  async down(client: DatabaseClient) {
    await client.query('DROP INDEX IF EXISTS idx_auth_tokens_expires_at');
    await client.query('DROP INDEX IF EXISTS idx_auth_tokens_user_purpose');
    await client.query('DROP TABLE IF EXISTS auth_tokens CASCADE');
  },
};
