/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - Auth owns register + login + /users/me/ and the bearer-token resolver
 *   every other module relies on.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AccessTokenService } from '../../shared/security/access-token';
import type { Logger } from '../../shared/logger/logger';
import type { UserRepo } from '../users';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  accessTokens: AccessTokenService;
  logger: Logger;
  userRepo: UserRepo;
}) {
  const authService = new AuthService({
    db: deps.db,
    passwordHasher: deps.passwordHasher,
    accessTokens: deps.accessTokens,
    logger: deps.logger,
    userRepo: deps.userRepo,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
