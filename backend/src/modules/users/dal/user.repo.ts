/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import { randomUUID } from 'node:crypto';
import type { DbExecutor } from '../../../shared/db/db';
import type { User } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user with a server-generated id.
   * Email and name must be globally unique (enforced by DB constraints).
   * `password` is stored as given: callers pass the PasswordHasher output.
   */
  async insertUser(params: { name: string; email: string; password: string }): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        id: randomUUID(),
        name: params.name,
        email: params.email.toLowerCase(),
        password: params.password,
      })
      .returning(['id', 'name', 'email'])
      .executeTakeFirstOrThrow();

    return { id: row.id, name: row.name, email: row.email };
  }
}
