/**
 * src/shared/db/migrations/0002_databases.ts
 *
 * WHY:
 * - A "database" is a named calendar namespace owned by one user.
 * - Listing is always by owner, hence the index.
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('databases')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('owner', 'uuid', (col) => col.notNull().references('users.id'))
    .execute();

  await db.schema.createIndex('databases_owner_idx').on('databases').column('owner').execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('databases').ifExists().execute();
}
