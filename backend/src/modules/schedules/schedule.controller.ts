/**
 * src/modules/schedules/schedule.controller.ts
 *
 * RULES:
 * - create/list require a bearer token.
 * - delete requires one only when `deleteRequiresAuth` is set (composition root).
 * - No DB access, no business rules.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { createScheduleSchema, deleteScheduleSchema } from './schedule.schemas';
import type { ScheduleService } from './schedule.service';
import { parseOrThrow } from '../../shared/http/validation';
import { requireUser } from '../../shared/http/require-auth-context';

export class ScheduleController {
  constructor(
    private readonly scheduleService: ScheduleService,
    private readonly deleteRequiresAuth: boolean,
  ) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);
    const input = parseOrThrow(createScheduleSchema, req.body);

    const schedule = await this.scheduleService.create(user, input);
    return reply.status(200).send(schedule);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);

    const schedules = await this.scheduleService.list(user);
    return reply.status(200).send(schedules);
  }

  async delete(req: FastifyRequest, reply: FastifyReply) {
    const requester = this.deleteRequiresAuth ? requireUser(req) : null;
    const input = parseOrThrow(deleteScheduleSchema, req.body);

    const result = await this.scheduleService.delete({ scheduleId: input.UUID, requester });
    return reply.status(200).send(result);
  }
}
