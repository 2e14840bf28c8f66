import type { DatabaseClient } from '../connection';

export interface Migration {
  up(client: DatabaseClient): Promise<void>;
  down(client: DatabaseClient): Promise<void>;
}

export interface MigrationInfo {
  name: string;
  migration: Migration;
}
