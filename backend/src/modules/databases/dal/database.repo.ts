/**
 * backend/src/modules/databases/dal/database.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for databases.
 *
 * RULES:
 * - No transactions started here.
 * - Owner comes from the caller (service stamps it from the authenticated user).
 */

import { randomUUID } from 'node:crypto';
import type { DbExecutor } from '../../../shared/db/db';
import type { CalendarDatabase } from '../database.types';

export class DatabaseRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertDatabase(params: { name: string; owner: string }): Promise<CalendarDatabase> {
    const row = await this.db
      .insertInto('databases')
      .values({ id: randomUUID(), name: params.name, owner: params.owner })
      .returning(['id', 'name', 'owner'])
      .executeTakeFirstOrThrow();

    return { id: row.id, name: row.name, owner: row.owner };
  }
}
