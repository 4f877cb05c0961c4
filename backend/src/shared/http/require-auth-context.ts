/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require bearer auth" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { User } from '../../modules/users';

/**
 * Controller guard: requires an authenticated user.
 *
 * Guard sequence:
 * 1) token presented but rejected -> the recorded failure (invalid token / user not found)
 * 2) no token at all             -> 401 "Not authenticated"
 */
export function requireUser(req: FastifyRequest): User {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized();

  if (ctx.failure) throw ctx.failure;
  if (!ctx.user) throw AppError.unauthorized();

  return ctx.user;
}
