/**
 * backend/src/modules/databases/database.types.ts
 *
 * WHY:
 * - A calendar "database" is a named namespace owned by exactly one user.
 */

export type CalendarDatabase = {
  id: string;
  name: string;
  owner: string;
};
