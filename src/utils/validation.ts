import { z } from 'zod';

// Shared request schemas
export const MAX_PAGE_SIZE = 100;

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1, 'Page must be at least 1').default(1),
  limit: z.coerce
    .number()
    .int()
    .min(1, 'Limit must be at least 1')
    .max(MAX_PAGE_SIZE, `Limit must be at most ${MAX_PAGE_SIZE}`)
    .default(20),
});

export const searchQuerySchema = paginationSchema.extend({
  q: z.string().trim().min(1, 'Search query must not be empty').max(100),
});

export const idParamSchema = z.object({
  id: z.string().uuid('Invalid id'),
});

export const emailSchema = z
  .string()
  .trim()
  .email('Invalid email address')
  .max(255)
  .transform(email => email.toLowerCase());

// bcrypt ignores everything past 72 bytes
export const passwordSchema = z
  .string()
  .min(1, 'Password must not be empty')
  .refine(value => Buffer.byteLength(value, 'utf8') <= 72, 'Password must be at most 72 bytes');

/** Calendar date in YYYY-MM-DD that actually exists */
export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine(value => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, 'Invalid calendar date');
