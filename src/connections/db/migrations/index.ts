import type { MigrationInfo } from './types';

import * as migration001 from './20260101_000001_create_users_table';
import * as migration002 from './20260101_000002_create_auth_tokens_table';
import * as migration003 from './20260101_000003_create_contacts_table';

export const migrations: MigrationInfo[] = [
  { name: '20260101_000001_create_users_table', migration: migration001.migration },
  { name: '20260101_000002_create_auth_tokens_table', migration: migration002.migration },
  { name: '20260101_000003_create_contacts_table', migration: migration003.migration },
];
