/**
 * backend/src/modules/schedules/queries/schedule.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectSchedulesByOwnerSql } from '../dal/schedule.query-sql';
import type { ScheduleRow } from '../dal/schedule.query-sql';
import type { Schedule } from '../schedule.types';

function toSchedule(row: ScheduleRow): Schedule {
  return {
    id: row.id,
    owner: row.owner,
    databaseId: row.database_id,
    title: row.title,
    description: row.description,
    startsAt: row.starts_at,
    endsAt: row.ends_at,
  };
}

export async function listSchedulesByOwner(db: DbExecutor, ownerId: string): Promise<Schedule[]> {
  const rows = await selectSchedulesByOwnerSql(db, ownerId);
  return rows.map(toSchedule);
}
