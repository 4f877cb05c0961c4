/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Migrations are registered statically so the same list runs from the CLI
 *   (migrate.ts), from tests, and from a bundled build, with no directory scan.
 *
 * RULES:
 * - Append only. Keys sort in execution order.
 */

import type { Migration, MigrationProvider } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_databases';
import * as m0003 from './0003_schedules';

export const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_databases': m0002,
  '0003_schedules': m0003,
};

export const staticMigrationProvider: MigrationProvider = {
  async getMigrations() {
    return MIGRATIONS;
  },
};
