/**
 * src/modules/databases/database.controller.ts
 *
 * RULES:
 * - Every endpoint requires a bearer token.
 * - No DB access, no business rules.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { createDatabaseSchema } from './database.schemas';
import type { DatabaseService } from './database.service';
import { parseOrThrow } from '../../shared/http/validation';
import { requireUser } from '../../shared/http/require-auth-context';

export class DatabaseController {
  constructor(private readonly databaseService: DatabaseService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);
    const input = parseOrThrow(createDatabaseSchema, req.body);

    const database = await this.databaseService.create(user, input);
    return reply.status(200).send(database);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);

    const databases = await this.databaseService.list(user);
    return reply.status(200).send(databases);
  }
}
