// Database
export { pool, migrate, connectDatabase, withTransaction, closeDatabase } from './db';

// Redis
export { redisClient, connectRedis, disconnectRedis, RedisCacheClient } from './redis';
export type { CacheClient } from './redis';

// Config - All configurations in one place
export {
  appConfig,
  authConfig,
  cacheConfig,
  emailConfig,
  storageConfig,
  dbConfig,
  redisConfig,
  assertProductionConfig,
} from './config';
