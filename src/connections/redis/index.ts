export { redisClient, connectRedis, disconnectRedis } from './redis.connection';
export { RedisCacheClient } from './cache.client';
export type { CacheClient } from './cache.client';
