/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for register, login and bearer-token resolution.
 * - Thin: each use-case lives in a flow or helper.
 *
 * RULES:
 * - No HTTP concerns.
 * - Never store/log raw tokens.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { InvalidTokenError } from '../../shared/security/access-token';
import type { AccessTokenService } from '../../shared/security/access-token';
import type { Logger } from '../../shared/logger/logger';
import type { User, UserRepo } from '../users';

import { AuthErrors } from './auth.errors';
import type { TokenResponse } from './auth.types';
import { authenticateUser } from './helpers/authenticate-user';
import { resolveIdentity } from './helpers/resolve-identity';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';

export type AuthServiceDeps = {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  accessTokens: AccessTokenService;
  logger: Logger;
  userRepo: UserRepo;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(params: RegisterParams): Promise<User> {
    return executeRegisterFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<TokenResponse> {
    return executeLoginFlow(this.deps, params);
  }

  /** Credential check without token issuance. Throws invalidCredentials. */
  async authenticate(identifier: string, secret: string): Promise<User> {
    const result = await authenticateUser(this.deps, identifier, secret);
    if (!result.ok) throw AuthErrors.invalidCredentials();
    return result.user;
  }

  /**
   * Bearer token → live user.
   * - signature/format/expiry problems → invalidToken
   * - subject no longer exists → userNotFound
   */
  async resolveBearerToken(token: string): Promise<User> {
    let subject: string;
    try {
      subject = this.deps.accessTokens.validate(token);
    } catch (err: unknown) {
      if (err instanceof InvalidTokenError) {
        throw AuthErrors.invalidToken({ reason: err.reason });
      }
      throw err;
    }

    return resolveIdentity(this.deps.db, subject);
  }
}
