/**
 * backend/src/modules/schedules/schedule.types.ts
 *
 * RULES:
 * - startsAt / endsAt are ISO-8601 UTC strings (normalised on write).
 * - databaseId, when set, names a database owned by the same user.
 */

export type Schedule = {
  id: string;
  owner: string;
  databaseId: string | null;
  title: string;
  description: string | null;
  startsAt: string;
  endsAt: string;
};

export type DeleteScheduleResult = {
  deleted: number;
};
