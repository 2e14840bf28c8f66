/**
 * Global test setup
 * Runs before any application module loads its configuration
 */

import { afterEach, vi } from 'vitest';

process.env['NODE_ENV'] = 'test';
process.env['JWT_SECRET'] = 'test-secret';
process.env['LOG_LEVEL'] = 'silent';
process.env['BCRYPT_ROUNDS'] = '4';
process.env['STORAGE_TYPE'] = 'local';
process.env['MAX_AVATAR_SIZE'] = '1024';

afterEach(() => {
  vi.restoreAllMocks();
});
