/**
 * src/modules/schedules/schedule.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { ScheduleRepo } from './dal/schedule.repo';
import { ScheduleService } from './schedule.service';
import { ScheduleController } from './schedule.controller';
import { registerScheduleRoutes } from './schedule.routes';

export type ScheduleModule = ReturnType<typeof createScheduleModule>;

export function createScheduleModule(deps: {
  db: DbExecutor;
  logger: Logger;
  deleteRequiresAuth: boolean;
}) {
  const scheduleRepo = new ScheduleRepo(deps.db);
  const scheduleService = new ScheduleService({ db: deps.db, scheduleRepo, logger: deps.logger });
  const controller = new ScheduleController(scheduleService, deps.deleteRequiresAuth);

  return {
    scheduleRepo,
    scheduleService,
    registerRoutes(app: FastifyInstance) {
      registerScheduleRoutes(app, controller);
    },
  };
}
