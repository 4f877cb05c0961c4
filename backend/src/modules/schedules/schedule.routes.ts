/**
 * src/modules/schedules/schedule.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { ScheduleController } from './schedule.controller';

export function registerScheduleRoutes(app: FastifyInstance, controller: ScheduleController) {
  app.post('/schedule/create', controller.create.bind(controller));
  app.get('/schedule', controller.list.bind(controller));
  app.post('/schedule/delete', controller.delete.bind(controller));
}
