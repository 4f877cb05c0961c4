/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - Only getCredentialsBy* expose the stored password.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByEmailSql, selectUserByNameSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User, UserCredentials } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
  };
}

function toCredentials(row: UserRow): UserCredentials {
  return { ...toUser(row), password: row.password };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function getCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toCredentials(row);
}

export async function getCredentialsByName(
  db: DbExecutor,
  name: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByNameSql(db, name);
  if (!row) return undefined;
  return toCredentials(row);
}
