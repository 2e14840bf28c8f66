import { z } from 'zod';
import { emailSchema, passwordSchema } from '../../utils/validation';

// Validation schemas for the auth module
export const signupSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
  name: z.string().trim().min(1, 'Name must not be empty').max(100),
});

export const emailOnlySchema = z.object({
  email: emailSchema,
});

export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password must not be empty'),
});

export const refreshTokenSchema = z.object({
  refresh_token: z.string().min(1, 'Refresh token must not be empty'),
});

export const verifyEmailQuerySchema = z.object({
  token: z.string().min(1, 'Token must not be empty'),
});

export const confirmResetSchema = z.object({
  token: z.string().min(1, 'Token must not be empty'),
  new_password: passwordSchema,
});
