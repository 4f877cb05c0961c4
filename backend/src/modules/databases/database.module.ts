/**
 * src/modules/databases/database.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { DatabaseRepo } from './dal/database.repo';
import { DatabaseService } from './database.service';
import { DatabaseController } from './database.controller';
import { registerDatabaseRoutes } from './database.routes';

export type DatabaseModule = ReturnType<typeof createDatabaseModule>;

export function createDatabaseModule(deps: { db: DbExecutor; logger: Logger }) {
  const databaseRepo = new DatabaseRepo(deps.db);
  const databaseService = new DatabaseService({ db: deps.db, databaseRepo, logger: deps.logger });
  const controller = new DatabaseController(databaseService);

  return {
    databaseRepo,
    databaseService,
    registerRoutes(app: FastifyInstance) {
      registerDatabaseRoutes(app, controller);
    },
  };
}
