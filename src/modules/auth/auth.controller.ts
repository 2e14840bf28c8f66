import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import type { AuthService } from './auth.service';
import {
  signupSchema,
  emailOnlySchema,
  loginSchema,
  refreshTokenSchema,
  verifyEmailQuerySchema,
  confirmResetSchema,
} from './auth.validation';

const CHECK_EMAIL_MESSAGE = 'If the account exists, an email has been sent';

export const createAuthController = (authService: AuthService) => ({
  signup: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const input = signupSchema.parse(req.body);
      const user = await authService.signup(input);
      return ResponseHandler.created(res, user, 'User created. Check your email to confirm the account');
    } catch (error) {
      next(error);
    }
  },

  resendVerification: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { email } = emailOnlySchema.parse(req.body);
      await authService.resendVerification(email);
      return ResponseHandler.success(res, null, CHECK_EMAIL_MESSAGE);
    } catch (error) {
      next(error);
    }
  },

  verifyEmail: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { token } = verifyEmailQuerySchema.parse(req.query);
      const user = await authService.verifyEmail(token);
      return ResponseHandler.success(res, user, 'Email confirmed');
    } catch (error) {
      next(error);
    }
  },

  login: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { email, password } = loginSchema.parse(req.body);
      const tokens = await authService.login(email, password);
      return ResponseHandler.success(res, tokens, 'Logged in');
    } catch (error) {
      next(error);
    }
  },

  refresh: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { refresh_token } = refreshTokenSchema.parse(req.body);
      const tokens = await authService.refresh(refresh_token);
      return ResponseHandler.success(res, tokens, 'Token refreshed');
    } catch (error) {
      next(error);
    }
  },

  logout: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { refresh_token } = refreshTokenSchema.parse(req.body);
      await authService.logout(refresh_token);
      return ResponseHandler.success(res, null, 'Logged out');
    } catch (error) {
      next(error);
    }
  },

  requestPasswordReset: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { email } = emailOnlySchema.parse(req.body);
      await authService.requestPasswordReset(email);
      return ResponseHandler.success(res, null, CHECK_EMAIL_MESSAGE);
    } catch (error) {
      next(error);
    }
  },

  confirmPasswordReset: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { token, new_password } = confirmResetSchema.parse(req.body);
      await authService.confirmPasswordReset(token, new_password);
      return ResponseHandler.success(res, null, 'Password has been reset');
    } catch (error) {
      next(error);
    }
  },
});

export type AuthController = ReturnType<typeof createAuthController>;
