/**
 * backend/src/modules/auth/helpers/authenticate-user.ts
 *
 * WHY:
 * - Identity dispatch + password check in one place:
 *   email-shaped identifier → lookup by email, otherwise → lookup by name,
 *   then PasswordHasher.verify against the stored value.
 *
 * RULES:
 * - Never throws for bad credentials; returns the failure reason so the flow
 *   can log it. The reason must not reach the client.
 * - The returned user never carries the stored password.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { getCredentialsByEmail, getCredentialsByName } from '../../users';
import type { User } from '../../users';
import type { AuthenticateResult } from '../auth.types';
import { classifyIdentifier } from './classify-identifier';

export async function authenticateUser(
  deps: { db: DbExecutor; passwordHasher: PasswordHasher },
  identifier: string,
  secret: string,
): Promise<AuthenticateResult<User>> {
  const identifierKind = classifyIdentifier(identifier);

  const credentials =
    identifierKind === 'email'
      ? await getCredentialsByEmail(deps.db, identifier)
      : await getCredentialsByName(deps.db, identifier);

  if (!credentials) {
    return { ok: false, reason: 'user_not_found', identifierKind };
  }

  const passwordValid = await deps.passwordHasher.verify(secret, credentials.password);
  if (!passwordValid) {
    return { ok: false, reason: 'wrong_password', identifierKind };
  }

  return {
    ok: true,
    user: { id: credentials.id, name: credentials.name, email: credentials.email },
  };
}
