/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Unknown keys are stripped: a client-supplied `id` never reaches the service.
 * - Email normalized to lowercase in the DAL, not here.
 */

import { z } from 'zod';
import { EMAIL_IDENTIFIER_PATTERN } from './auth.constants';

export const registerSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  // Login only routes identifiers matching this pattern to email lookup.
  email: z
    .string()
    .email('Invalid email address')
    .regex(EMAIL_IDENTIFIER_PATTERN, 'Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

/**
 * OAuth2 password-grant form: `username` is either an email or a user name.
 */
export const loginSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});
