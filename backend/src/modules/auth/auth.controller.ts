/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for register, login and "who am I".
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Responses never include the stored password.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { registerSchema, loginSchema } from './auth.schemas';
import type { AuthService } from './auth.service';
import type { RequestMeta } from './auth.types';
import { parseOrThrow } from '../../shared/http/validation';
import { requireUser } from '../../shared/http/require-auth-context';

function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    ip: req.ip,
    requestId: req.requestContext.requestId,
  };
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const input = parseOrThrow(registerSchema, req.body);

    const user = await this.authService.register({
      ...requestMeta(req),
      name: input.name,
      email: input.email,
      password: input.password,
    });

    return reply.status(200).send(user);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const input = parseOrThrow(loginSchema, req.body);

    const result = await this.authService.login({
      ...requestMeta(req),
      identifier: input.username,
      password: input.password,
    });

    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);
    return reply.status(200).send({ id: user.id, name: user.name, email: user.email });
  }
}
