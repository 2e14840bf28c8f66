import express from 'express';
import type { RateLimitFactory } from '../../middlewares/rateLimit.middleware';
import { rateLimitPolicies } from '../../middlewares/rateLimit.middleware';
import type { AuthController } from './auth.controller';

export const createAuthRouter = (authController: AuthController, rateLimit: RateLimitFactory) => {
  const router = express.Router();

  router.post('/signup', rateLimit(rateLimitPolicies.signup), authController.signup);

  router.get('/verify-email', authController.verifyEmail);

  router.post(
    '/resend-verification',
    rateLimit(rateLimitPolicies.resendVerification),
    authController.resendVerification
  );

  router.post('/login', rateLimit(rateLimitPolicies.login), authController.login);

  // Refresh rotates the token pair
  router.post('/refresh', authController.refresh);

  router.post('/logout', authController.logout);

  router.post('/reset-password', rateLimit(rateLimitPolicies.passwordReset), authController.requestPasswordReset);

  router.post('/reset-password/confirm', authController.confirmPasswordReset);

  return router;
};
