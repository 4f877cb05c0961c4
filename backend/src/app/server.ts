/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId)
 * 2. empty auth context
 * 3. bearer token → user (or recorded failure)
 * 4. request log line
 */

import Fastify from 'fastify';
import formbody from '@fastify/formbody';

import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerBearerAuth } from '../shared/http/bearer-auth.middleware';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  // POST /login takes an OAuth2 password form
  await app.register(formbody);

  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, (token) => opts.deps.auth.authService.resolveBearerToken(token));
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      userId: req.authContext.user?.id ?? null,
    });
    done();
  });

  return app;
}
