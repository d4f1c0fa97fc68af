/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email normalized to lowercase in the DAL, not here.
 * - The token schema checks shape only; existence/expiry is the token store's job.
 */

import { z } from 'zod';
import { TOKEN_LENGTH } from '../tokens';
import { NAME_MAX_BYTES, PASSWORD_MAX_BYTES, PASSWORD_MIN_CHARS } from './auth.constants';

function maxBytes(limit: number) {
  return (value: string) => Buffer.byteLength(value, 'utf8') <= limit;
}

const email = z.string().trim().email('must be a valid email address');

export const registerSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'must be provided')
    .refine(maxBytes(NAME_MAX_BYTES), { message: `must not be more than ${NAME_MAX_BYTES} bytes long` }),
  email,
  password: z
    .string()
    .min(PASSWORD_MIN_CHARS, `must be at least ${PASSWORD_MIN_CHARS} characters long`)
    .refine(maxBytes(PASSWORD_MAX_BYTES), {
      message: `must not be more than ${PASSWORD_MAX_BYTES} bytes long`,
    }),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const activateSchema = z.object({
  token: z.string().length(TOKEN_LENGTH, `must be ${TOKEN_LENGTH} bytes long`),
});

export type ActivateInput = z.infer<typeof activateSchema>;

export const loginSchema = z.object({
  email,
  password: z.string().min(1, 'must be provided'),
});

export type LoginInput = z.infer<typeof loginSchema>;
