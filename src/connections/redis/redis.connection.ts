import { createClient } from 'redis';
import { redisConfig } from '../config/redis.config';
import { logger } from '../../utils/logging';

const client = createClient({
  socket: {
    host: redisConfig.host,
    port: redisConfig.port,
  },
  ...(redisConfig.password && { password: redisConfig.password }),
  database: redisConfig.db,
  // fail fast while disconnected so cache reads degrade instead of queueing
  disableOfflineQueue: true,
});

client.on('error', (err: Error) => {
  logger.error('Redis Client Error', { error: err.message });
});

/**
 * Connect to Redis
 */
export const connectRedis = async (): Promise<void> => {
  try {
    if (!client.isOpen) {
      await client.connect();
      logger.info('Redis connected successfully');
    } else {
      logger.info('Redis already connected');
    }
  } catch (err: unknown) {
    logger.error('Failed to connect to Redis', { error: err instanceof Error ? err.message : String(err) });
    throw err;
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (client.isOpen) {
    await client.quit();
  }
};

export const redisClient = client;
