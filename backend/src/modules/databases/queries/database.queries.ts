/**
 * backend/src/modules/databases/queries/database.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectDatabaseByIdSql, selectDatabasesByOwnerSql } from '../dal/database.query-sql';
import type { DatabaseRow } from '../dal/database.query-sql';
import type { CalendarDatabase } from '../database.types';

function toDatabase(row: DatabaseRow): CalendarDatabase {
  return { id: row.id, name: row.name, owner: row.owner };
}

export async function listDatabasesByOwner(
  db: DbExecutor,
  ownerId: string,
): Promise<CalendarDatabase[]> {
  const rows = await selectDatabasesByOwnerSql(db, ownerId);
  return rows.map(toDatabase);
}

export async function getDatabaseById(
  db: DbExecutor,
  databaseId: string,
): Promise<CalendarDatabase | undefined> {
  const row = await selectDatabaseByIdSql(db, databaseId);
  if (!row) return undefined;
  return toDatabase(row);
}
