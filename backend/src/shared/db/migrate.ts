/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - CLI entry to run migrations against DATABASE_URL.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await migrateToLatest(db, logger);
    logger.info('migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.failed', { err });
  process.exit(1);
});
