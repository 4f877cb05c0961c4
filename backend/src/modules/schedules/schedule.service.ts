/**
 * src/modules/schedules/schedule.service.ts
 *
 * WHY:
 * - Create/list/delete calendar entries.
 *
 * RULES:
 * - Owner is ALWAYS the requester on create (owner stamping).
 * - A target database must pass the ownership guard; "not yours" and
 *   "does not exist" are the same 404.
 * - Delete without a requester removes by id alone. That is the historical
 *   contract of POST /schedule/delete; the controller only passes a requester
 *   when SCHEDULE_DELETE_REQUIRE_AUTH is on.
 * - With a requester, the ownership guard runs inside the DELETE (owner = requester.id):
 *   a foreign or missing id removes nothing.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { User } from '../users';
import { getDatabaseById, DatabaseErrors } from '../databases';
import { isOwnedBy } from '../_shared/policies/ownership.policy';
import type { ScheduleRepo } from './dal/schedule.repo';
import { listSchedulesByOwner } from './queries/schedule.queries';
import type { DeleteScheduleResult, Schedule } from './schedule.types';
import type { CreateScheduleInput } from './schedule.schemas';

function toUtcIso(value: string): string {
  return new Date(value).toISOString();
}

export class ScheduleService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      scheduleRepo: ScheduleRepo;
      logger: Logger;
    },
  ) {}

  async create(user: User, input: CreateScheduleInput): Promise<Schedule> {
    const databaseId = input.databaseId ?? null;

    if (databaseId) {
      const database = await getDatabaseById(this.deps.db, databaseId);
      if (!isOwnedBy(database, user)) {
        throw DatabaseErrors.notFound({ databaseId });
      }
    }

    const schedule = await this.deps.scheduleRepo.insertSchedule({
      owner: user.id,
      databaseId,
      title: input.title,
      description: input.description ?? null,
      startsAt: toUtcIso(input.startsAt),
      endsAt: toUtcIso(input.endsAt),
    });

    this.deps.logger.info('schedule.created', {
      flow: 'schedule.create',
      userId: user.id,
      scheduleId: schedule.id,
    });

    return schedule;
  }

  async list(user: User): Promise<Schedule[]> {
    return listSchedulesByOwner(this.deps.db, user.id);
  }

  async delete(params: {
    scheduleId: string;
    requester: User | null;
  }): Promise<DeleteScheduleResult> {
    const { scheduleId, requester } = params;

    const deleted = await this.deps.scheduleRepo.deleteSchedule({
      scheduleId,
      ownerId: requester?.id ?? null,
    });

    this.deps.logger.info('schedule.deleted', {
      flow: 'schedule.delete',
      scheduleId,
      userId: requester?.id ?? null,
      deleted,
    });

    return { deleted };
  }
}
