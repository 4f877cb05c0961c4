/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Registration = email uniqueness check + insert, in one transaction so the
 *   check and the write see the same snapshot and share one connection.
 *
 * RULES:
 * - Id is generated server-side (UserRepo); client ids never reach here.
 * - Password goes through the configured PasswordHasher before storage.
 * - The lookup is a fast path; the email unique constraint decides races and
 *   its violation also maps to duplicateEmail.
 * - Name uniqueness is the DB constraint's job; a violation propagates as an
 *   unexpected error (500).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import { isUniqueViolation } from '../../../../shared/db/unique-violation';

import { getUserByEmail } from '../../../users';
import type { User, UserRepo } from '../../../users';
import { AuthErrors } from '../../auth.errors';
import type { RequestMeta } from '../../auth.types';

const USERS_EMAIL = { table: 'users', column: 'email' } as const;

export type RegisterParams = RequestMeta & {
  name: string;
  email: string;
  password: string;
};

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    passwordHasher: PasswordHasher;
    userRepo: UserRepo;
    logger: Logger;
  },
  params: RegisterParams,
): Promise<User> {
  const storedPassword = await deps.passwordHasher.hash(params.password);

  const rejectDuplicate = () => {
    deps.logger.warn('auth.register.duplicate_email', {
      flow: 'auth.register',
      requestId: params.requestId,
      ip: params.ip,
    });
    return AuthErrors.duplicateEmail();
  };

  let user: User;
  try {
    user = await deps.db.transaction().execute(async (trx) => {
      const existing = await getUserByEmail(trx, params.email);
      if (existing) throw rejectDuplicate();

      return deps.userRepo.withDb(trx).insertUser({
        name: params.name,
        email: params.email,
        password: storedPassword,
      });
    });
  } catch (err: unknown) {
    // A concurrent registration won the race past the lookup.
    if (isUniqueViolation(err, USERS_EMAIL)) throw rejectDuplicate();
    throw err;
  }

  deps.logger.info('auth.register.success', {
    flow: 'auth.register',
    requestId: params.requestId,
    userId: user.id,
  });

  return user;
}
