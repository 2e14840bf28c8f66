import type { DatabaseClient } from '../connection';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: DatabaseClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS contacts (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        first_name VARCHAR(100) NOT NULL,
        last_name VARCHAR(100) NOT NULL,
        email VARCHAR(255) NOT NULL,
        phone VARCHAR(30),
        birth_date DATE NOT NULL,
        notes TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_contacts_user_email ON contacts (user_id, LOWER(email))
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_contacts_user_created ON contacts (user_id, created_at, id)
    `);
  },

  async down(client: DatabaseClient) {
    await client.query('DROP INDEX IF EXISTS idx_contacts_user_created');
    await client.query('DROP INDEX IF EXISTS idx_contacts_user_email');
    await client.query('DROP TABLE IF EXISTS contacts CASCADE');
  },
};
