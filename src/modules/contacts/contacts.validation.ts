import { z } from 'zod';
import { isoDateSchema } from '../../utils/validation';

const nameSchema = (label: string) => z.string().trim().min(1, `${label} must not be empty`).max(100);

export const createContactSchema = z.object({
  first_name: nameSchema('First name'),
  last_name: nameSchema('Last name'),
  email: z.string().trim().email('Invalid email address').max(255),
  phone: z
    .string()
    .trim()
    .regex(/^\+?[0-9\s\-()]{5,30}$/, 'Invalid phone number')
    .nullable()
    .optional(),
  birth_date: isoDateSchema,
  notes: z.string().max(1000).nullable().optional(),
});

export const updateContactSchema = createContactSchema
  .partial()
  .refine(data => Object.values(data).some(value => value !== undefined), {
    message: 'At least one field must be provided',
  });
