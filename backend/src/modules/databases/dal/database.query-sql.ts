/**
 * backend/src/modules/databases/dal/database.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for databases.
 *
 * RULES:
 * - No AppError.
 * - No policies (ownership is decided by the service).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Databases } from '../../../shared/db/database.types';

export type DatabaseRow = Selectable<Databases>;

export async function selectDatabasesByOwnerSql(
  db: DbExecutor,
  ownerId: string,
): Promise<DatabaseRow[]> {
  return db
    .selectFrom('databases')
    .selectAll()
    .where('owner', '=', ownerId)
    .orderBy('name', 'asc')
    .orderBy('id', 'asc')
    .execute();
}

export async function selectDatabaseByIdSql(
  db: DbExecutor,
  databaseId: string,
): Promise<DatabaseRow | undefined> {
  return db.selectFrom('databases').selectAll().where('id', '=', databaseId).executeTakeFirst();
}
