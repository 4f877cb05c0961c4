/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case: authenticate → issue bearer token.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - No raw SQL here (use queries/repos).
 * - Unknown identifier and wrong password both end in the same
 *   invalidCredentials error; only the log line records which one happened.
 * - Never log the password, the raw identifier or the token.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { AccessTokenService } from '../../../../shared/security/access-token';
import type { Logger } from '../../../../shared/logger/logger';

import { AuthErrors } from '../../auth.errors';
import { TOKEN_TYPE } from '../../auth.constants';
import type { RequestMeta, TokenResponse } from '../../auth.types';
import { authenticateUser } from '../../helpers/authenticate-user';

export type LoginParams = RequestMeta & {
  identifier: string;
  password: string;
};

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    passwordHasher: PasswordHasher;
    accessTokens: AccessTokenService;
    logger: Logger;
  },
  params: LoginParams,
): Promise<TokenResponse> {
  const result = await authenticateUser(deps, params.identifier, params.password);

  if (!result.ok) {
    deps.logger.warn('auth.login.failed', {
      flow: 'auth.login',
      requestId: params.requestId,
      ip: params.ip,
      identifierKind: result.identifierKind,
      reason: result.reason,
    });
    throw AuthErrors.invalidCredentials();
  }

  const accessToken = deps.accessTokens.issue(result.user.email);

  deps.logger.info('auth.login.success', {
    flow: 'auth.login',
    requestId: params.requestId,
    userId: result.user.id,
  });

  return { access_token: accessToken, token_type: TOKEN_TYPE };
}
