import express from 'express';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import path from 'path';
import { appConfig, authConfig, cacheConfig, storageConfig } from './connections/config/app.config';
import type { CacheClient } from './connections/redis/cache.client';
import { createAuthenticate } from './middlewares/auth.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { createRateLimit } from './middlewares/rateLimit.middleware';
import { createAuthController } from './modules/auth/auth.controller';
import type { UserRepository } from './modules/auth/auth.repository';
import { AuthService, authSettingsFromConfig } from './modules/auth/auth.service';
import type { AuthSettings } from './modules/auth/auth.service';
import { BcryptPasswordHasher } from './modules/auth/password.service';
import type { PasswordHasher } from './modules/auth/password.service';
import { TokenService } from './modules/auth/token.service';
import { createContactsController } from './modules/contacts/contacts.controller';
import type { ContactRepository } from './modules/contacts/contacts.repository';
import { ContactsService } from './modules/contacts/contacts.service';
import type { AvatarStorage } from './modules/upload/storage.service';
import { createUsersController } from './modules/users/users.controller';
import { UsersService } from './modules/users/users.service';
import { createRoutes } from './routes';
import { CacheService } from './utils/cache.service';
import type { NotificationSender } from './utils/email.service';
import { ForbiddenError } from './utils/errors';
import { logger, errorMessage } from './utils/logging';

export interface AppDependencies {
  users: UserRepository;
  contacts: ContactRepository;
  cacheClient: CacheClient;
  notifications: NotificationSender;
  avatarStorage: AvatarStorage;
  /** Resolves when the database answers */
  pingDatabase: () => Promise<unknown>;
  passwords?: PasswordHasher;
  authSettings?: AuthSettings;
  now?: () => Date;
}

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an Origin header (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [appConfig.frontendUrl, ...appConfig.corsOrigins];
    if (appConfig.nodeEnv === 'development') {
      allowedOrigins.push(...DEV_ORIGINS);
    }

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      callback(null, true);
    } else {
      callback(new ForbiddenError('Origin not allowed'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
  maxAge: 86400,
  optionsSuccessStatus: 200,
};

export const createApp = (deps: AppDependencies) => {
  const cache = new CacheService(deps.cacheClient);
  const tokens = new TokenService({
    secret: authConfig.jwtSecret,
    algorithm: authConfig.jwtAlgorithm,
    now: deps.now,
  });

  const authService = new AuthService({
    users: deps.users,
    tokens,
    passwords: deps.passwords ?? new BcryptPasswordHasher(),
    notifications: deps.notifications,
    cache,
    settings: deps.authSettings ?? authSettingsFromConfig(),
  });
  const contactsService = new ContactsService({
    contacts: deps.contacts,
    cache,
    listTtlSeconds: cacheConfig.contactsTtlSeconds,
    now: deps.now,
  });
  const usersService = new UsersService(deps.users, deps.avatarStorage, cache);

  const app = express();

  // Behind a reverse proxy req.ip must be the client address for rate limiting
  app.set('trust proxy', 1);

  app.use(cors(corsOptions));
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    const [database, redis] = await Promise.allSettled([deps.pingDatabase(), deps.cacheClient.ping()]);
    const status = {
      database: database.status === 'fulfilled' ? 'connected' : 'disconnected',
      redis: redis.status === 'fulfilled' ? 'connected' : 'disconnected',
    };

    if (database.status === 'rejected' || redis.status === 'rejected') {
      logger.warn('[Health] Dependency check failed', {
        database: database.status === 'rejected' ? errorMessage(database.reason) : 'ok',
        redis: redis.status === 'rejected' ? errorMessage(redis.reason) : 'ok',
      });
      res.status(503).json({ status: 'error', ...status });
      return;
    }

    res.json({ status: 'ok', ...status });
  });

  // Locally stored avatars
  app.use('/uploads', express.static(path.resolve(storageConfig.uploadDir)));

  app.use(
    createRoutes({
      controllers: {
        auth: createAuthController(authService),
        contacts: createContactsController(contactsService),
        users: createUsersController(usersService),
      },
      authenticate: createAuthenticate(authService),
      rateLimit: createRateLimit(deps.cacheClient),
    })
  );

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
