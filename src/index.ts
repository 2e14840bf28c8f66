import type { Server } from 'http';
import { createApp } from './app';
import { appConfig, assertProductionConfig } from './connections/config/app.config';
import {
  pool,
  connectDatabase,
  closeDatabase,
  redisClient,
  connectRedis,
  disconnectRedis,
  RedisCacheClient,
} from './connections';
import { PgUserRepository } from './modules/auth/auth.repository';
import { PgContactRepository } from './modules/contacts/contacts.repository';
import { createAvatarStorage } from './modules/upload/storage.service';
import { createMailTransport, MailNotificationSender } from './utils/email.service';
import { logger, errorMessage } from './utils/logging';

const PORT = appConfig.port;

let server: Server | undefined;

const shutdown = async (signal: string): Promise<void> => {
  logger.info(`${signal} received, shutting down...`);

  if (server) {
    const running = server;
    await new Promise<void>((resolve, reject) => {
      running.close(err => (err ? reject(err) : resolve()));
    });
  }

  await Promise.allSettled([closeDatabase(), disconnectRedis()]);
  logger.info('Shutdown complete');
};

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  assertProductionConfig();

  logger.info('Connecting to database...');
  await connectDatabase();

  logger.info('Connecting to Redis...');
  await connectRedis();

  const app = createApp({
    users: new PgUserRepository(pool),
    contacts: new PgContactRepository(pool),
    cacheClient: new RedisCacheClient(redisClient),
    notifications: new MailNotificationSender(createMailTransport()),
    avatarStorage: createAvatarStorage(),
    pingDatabase: () => pool.query('SELECT 1'),
  });

  server = app.listen(PORT, () => {
    logger.info(`Server is running on port ${PORT}`);
    logger.info(`Environment: ${appConfig.nodeEnv}`);
  });
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
