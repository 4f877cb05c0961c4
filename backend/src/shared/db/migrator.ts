/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One function that brings any Kysely<DB> (pg in dev/prod, in-memory SQLite
 *   in tests) to the latest schema.
 */

import { Migrator } from 'kysely';
import type { Db } from './db';
import { staticMigrationProvider } from './migrations';
import type { Logger } from '../logger/logger';

export class MigrationError extends Error {
  constructor(public readonly failedMigration: string | null, cause: unknown) {
    super(`Migration failed${failedMigration ? `: ${failedMigration}` : ''}`, { cause });
    this.name = 'MigrationError';
  }
}

export async function migrateToLatest(db: Db, log?: Logger): Promise<void> {
  const migrator = new Migrator({ db, provider: staticMigrationProvider });

  const { error, results } = await migrator.migrateToLatest();

  let failed: string | null = null;
  for (const r of results ?? []) {
    if (r.status === 'Success') log?.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') {
      failed = r.migrationName;
      log?.error('migration.error', { migration: r.migrationName });
    }
  }

  if (error) throw new MigrationError(failed, error);
}
