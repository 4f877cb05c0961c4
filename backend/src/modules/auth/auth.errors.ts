/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Every 401 carries `WWW-Authenticate: Bearer`.
 * - Never include passwords or tokens in meta.
 */

import { AppError, BEARER_CHALLENGE, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /**
   * Login: unknown identifier OR wrong password.
   * One error for both so the response never reveals whether an account exists.
   */
  invalidCredentials(meta?: AppErrorMeta) {
    return new AppError({
      code: 'INVALID_CREDENTIALS',
      status: 401,
      message: 'Incorrect email or password',
      meta,
      headers: BEARER_CHALLENGE,
    });
  },

  /** Bad signature, malformed, or expired token. Callers never see which. */
  invalidToken(meta?: AppErrorMeta) {
    return new AppError({
      code: 'INVALID_TOKEN',
      status: 401,
      message: 'Could not validate credentials',
      meta,
      headers: BEARER_CHALLENGE,
    });
  },

  /**
   * Token is valid but its subject no longer resolves to a user.
   * The detail echoes the resolved identity (existing client contract).
   */
  userNotFound(email: string, meta?: AppErrorMeta) {
    return new AppError({
      code: 'USER_NOT_FOUND',
      status: 401,
      message: `User not found: ${email}`,
      meta,
      headers: BEARER_CHALLENGE,
    });
  },

  /** Registration: email already taken. */
  duplicateEmail(meta?: AppErrorMeta) {
    return new AppError({
      code: 'DUPLICATE_EMAIL',
      status: 400,
      message: 'Email already registered',
      meta,
    });
  },
} as const;
