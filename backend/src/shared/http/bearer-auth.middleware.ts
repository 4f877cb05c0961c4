/**
 * backend/src/shared/http/bearer-auth.middleware.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <token>` on every request and resolves it to
 *   a user once, before any handler runs.
 * - Does NOT throw for rejected credentials; it records the failure on
 *   req.authContext and lets requireUser() decide. Public endpoints
 *   (/login, /register) stay reachable with a stale token.
 *
 * RULES:
 * - Runs AFTER the requestContext and authContext hooks.
 * - Missing header or a non-Bearer scheme leaves the context empty.
 * - Only AppError is recorded; anything else is a real fault and propagates (500).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { User } from '../../modules/users';

export type BearerResolver = (token: string) => Promise<User>;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (!scheme || scheme.toLowerCase() !== 'bearer') return null;
  if (!token || rest.length > 0) return null;

  return token;
}

export function registerBearerAuth(app: FastifyInstance, resolve: BearerResolver): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) return;

    try {
      req.authContext = { user: await resolve(token), failure: null };
    } catch (err: unknown) {
      if (!(err instanceof AppError)) throw err;
      req.authContext = { user: null, failure: err };
    }
  });
}
