/**
 * src/modules/databases/database.service.ts
 *
 * WHY:
 * - Create/list calendar databases for the authenticated user.
 *
 * RULES:
 * - Owner is ALWAYS the requester (owner stamping); request bodies never set it.
 * - Listing is scoped by owner.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { User } from '../users';
import type { DatabaseRepo } from './dal/database.repo';
import { listDatabasesByOwner } from './queries/database.queries';
import type { CalendarDatabase } from './database.types';
import type { CreateDatabaseInput } from './database.schemas';

/** Database names are stored with spaces replaced by underscores. */
export function normalizeDatabaseName(name: string): string {
  return name.replace(/ /g, '_');
}

export class DatabaseService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      databaseRepo: DatabaseRepo;
      logger: Logger;
    },
  ) {}

  async create(user: User, input: CreateDatabaseInput): Promise<CalendarDatabase> {
    const database = await this.deps.databaseRepo.insertDatabase({
      name: normalizeDatabaseName(input.name),
      owner: user.id,
    });

    this.deps.logger.info('database.created', {
      flow: 'database.create',
      userId: user.id,
      databaseId: database.id,
    });

    return database;
  }

  async list(user: User): Promise<CalendarDatabase[]> {
    return listDatabasesByOwner(this.deps.db, user.id);
  }
}
