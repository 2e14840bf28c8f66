import express from 'express';
import type { RequestHandler } from 'express';
import type { RateLimitFactory } from '../middlewares/rateLimit.middleware';
import type { AuthController } from '../modules/auth/auth.controller';
import { createAuthRouter } from '../modules/auth/auth.routes';
import type { ContactsController } from '../modules/contacts/contacts.controller';
import { createContactsRouter } from '../modules/contacts/contacts.routes';
import type { UsersController } from '../modules/users/users.controller';
import { createUsersRouter } from '../modules/users/users.routes';

export interface RouteDependencies {
  controllers: {
    auth: AuthController;
    contacts: ContactsController;
    users: UsersController;
  };
  authenticate: RequestHandler;
  rateLimit: RateLimitFactory;
}

export const createRoutes = ({ controllers, authenticate, rateLimit }: RouteDependencies) => {
  const router = express.Router();

  router.use('/auth', createAuthRouter(controllers.auth, rateLimit));
  router.use('/contacts', createContactsRouter(controllers.contacts, authenticate, rateLimit));
  router.use('/users', createUsersRouter(controllers.users, authenticate, rateLimit));

  return router;
};
