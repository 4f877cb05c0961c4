/**
 * src/modules/databases/database.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { DatabaseController } from './database.controller';

export function registerDatabaseRoutes(app: FastifyInstance, controller: DatabaseController) {
  app.post('/database/create', controller.create.bind(controller));
  app.get('/database', controller.list.bind(controller));
}
