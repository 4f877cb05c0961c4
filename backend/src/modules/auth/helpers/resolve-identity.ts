/**
 * backend/src/modules/auth/helpers/resolve-identity.ts
 *
 * WHY:
 * - A valid token only proves who the user WAS at issuance. The subject
 *   (email) is looked up again on every request so deleted accounts stop
 *   authenticating.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { getUserByEmail } from '../../users';
import type { User } from '../../users';
import { AuthErrors } from '../auth.errors';

export async function resolveIdentity(db: DbExecutor, subject: string): Promise<User> {
  const user = await getUserByEmail(db, subject);
  if (!user) throw AuthErrors.userNotFound(subject);
  return user;
}
