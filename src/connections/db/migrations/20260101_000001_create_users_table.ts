import type { DatabaseClient } from '../connection';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: DatabaseClient) {
    await client.query(`
      DO $$ BEGIN
        CREATE TYPE user_role AS ENUM ('user', 'admin');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    await client.query(`
      CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        -- always written lower-cased by the repository
        email VARCHAR(255) NOT NULL,
        password_hash VARCHAR(255) NOT NULL,
        name VARCHAR(100) NOT NULL,
        role user_role NOT NULL DEFAULT 'user',
        is_verified BOOLEAN NOT NULL DEFAULT FALSE,
        avatar_url VARCHAR(500),
        token_version INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email_lower ON users (LOWER(email))
    `);
  },

  async down(client: DatabaseClient) {
    await client.query('DROP INDEX IF EXISTS idx_users_email_lower');
    await client.query('DROP TABLE IF EXISTS users CASCADE');
    await client.query('DROP TYPE IF EXISTS user_role CASCADE');
  },
};
