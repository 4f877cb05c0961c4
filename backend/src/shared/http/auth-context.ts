/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is resolved once per request, before handlers.
 * - Endpoints decide whether authentication is required (requireUser).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. The bearer middleware overwrites it: either `user` (valid token, live user)
 *    or `failure` (why the presented credentials were rejected).
 * 3. Controllers call requireUser(req); public endpoints ignore the context.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { AppError } from './errors';
import type { User } from '../../modules/users';

export type AuthContext = {
  user: User | null;

  /** Set when a bearer token was presented but did not resolve to a user. */
  failure: AppError | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      user: null,
      failure: null,
    };

    done();
  });
}
