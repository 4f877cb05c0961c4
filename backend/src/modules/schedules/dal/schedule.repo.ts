/**
 * backend/src/modules/schedules/dal/schedule.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for schedules.
 *
 * RULES:
 * - No transactions started here.
 * - Ownership on delete is part of the statement itself: given an owner,
 *   the row must match id AND owner, so no read can drift from the write.
 */

import { randomUUID } from 'node:crypto';
import type { DbExecutor } from '../../../shared/db/db';
import type { Schedule } from '../schedule.types';

export class ScheduleRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertSchedule(params: Omit<Schedule, 'id'>): Promise<Schedule> {
    const row = await this.db
      .insertInto('schedules')
      .values({
        id: randomUUID(),
        owner: params.owner,
        database_id: params.databaseId,
        title: params.title,
        description: params.description,
        starts_at: params.startsAt,
        ends_at: params.endsAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

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

  /**
   * Returns the number of rows removed (0 or 1).
   * `ownerId: null` deletes by id alone.
   */
  async deleteSchedule(params: { scheduleId: string; ownerId: string | null }): Promise<number> {
    let query = this.db.deleteFrom('schedules').where('id', '=', params.scheduleId);
    if (params.ownerId !== null) query = query.where('owner', '=', params.ownerId);

    const result = await query.executeTakeFirst();
    return Number(result.numDeletedRows);
  }
}
