import express from 'express';
import type { RequestHandler } from 'express';
import type { RateLimitFactory } from '../../middlewares/rateLimit.middleware';
import { rateLimitPolicies } from '../../middlewares/rateLimit.middleware';
import { avatarUploadMiddleware } from './users.controller';
import type { UsersController } from './users.controller';

export const createUsersRouter = (
  usersController: UsersController,
  authenticate: RequestHandler,
  rateLimit: RateLimitFactory
) => {
  const router = express.Router();

  router.use(authenticate);

  router.get('/me', usersController.getMe);
  router.patch(
    '/avatar',
    rateLimit(rateLimitPolicies.avatarUpload),
    avatarUploadMiddleware,
    usersController.updateAvatar
  );

  return router;
};
