/**
 * src/shared/db/migrations/0003_schedules.ts
 *
 * WHY:
 * - Calendar entries, owned by a user and optionally filed under one of the
 *   owner's databases.
 * - starts_at / ends_at are ISO-8601 UTC strings so ordering by text is
 *   ordering by time.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('schedules')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('owner', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('database_id', 'uuid', (col) => col.references('databases.id').onDelete('set null'))
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('starts_at', 'text', (col) => col.notNull())
    .addColumn('ends_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('schedules_owner_starts_at_idx')
    .on('schedules')
    .columns(['owner', 'starts_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('schedules').ifExists().execute();
}
