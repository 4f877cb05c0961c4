/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Types for the Auth module's flows and responses.
 *
 * RULES:
 * - Never include raw passwords in response types.
 */

import type { TOKEN_TYPE } from './auth.constants';

export type IdentifierKind = 'email' | 'name';

export type LoginFailureReason = 'user_not_found' | 'wrong_password';

export type AuthenticateResult<U> =
  | { ok: true; user: U }
  | { ok: false; reason: LoginFailureReason; identifierKind: IdentifierKind };

/** OAuth2-style token response returned by POST /login. */
export type TokenResponse = {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
};

export type RequestMeta = {
  ip: string;
  requestId: string;
};
