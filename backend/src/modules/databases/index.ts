/**
 * backend/src/modules/databases/index.ts
 *
 * WHY:
 * - Public surface of the databases module (schedules look up their target
 *   database through here).
 */

export { getDatabaseById, listDatabasesByOwner } from './queries/database.queries';
export { DatabaseErrors } from './database.errors';
export type { CalendarDatabase } from './database.types';
