export {
  appConfig,
  authConfig,
  cacheConfig,
  emailConfig,
  storageConfig,
  loggingConfig,
  assertProductionConfig,
} from './app.config';
export { dbConfig } from './database.config';
export { redisConfig } from './redis.config';
