/**
 * backend/src/modules/schedules/dal/schedule.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for schedules.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Schedules } from '../../../shared/db/database.types';

export type ScheduleRow = Selectable<Schedules>;

export async function selectSchedulesByOwnerSql(
  db: DbExecutor,
  ownerId: string,
): Promise<ScheduleRow[]> {
  return db
    .selectFrom('schedules')
    .selectAll()
    .where('owner', '=', ownerId)
    .orderBy('starts_at', 'asc')
    .orderBy('id', 'asc')
    .execute();
}
