/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → status + headers + `{ detail, code }`.
 * - Validation (AppError VALIDATION_ERROR, unparsable bodies) → 422 envelope
 *   `{ status_code: 10422, message, data: null }`.
 * - Unexpected errors → 500 with generic message.
 * - Log every error with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

export const VALIDATION_STATUS_CODE = 10422;

type ErrorResponseBody = {
  detail: string;
  code: string;
};

type ValidationResponseBody = {
  status_code: typeof VALIDATION_STATUS_CODE;
  message: string;
  data: null;
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'access_token',
  'authorization',
  'password',
  'passwordHash',
  'secret',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, detail: string): ErrorResponseBody {
  return { detail, code };
}

function buildValidationResponse(message: string): ValidationResponseBody {
  // Single-line message, same as the body the client would log.
  return {
    status_code: VALIDATION_STATUS_CODE,
    message: message.replace(/\s+/g, ' ').trim(),
    data: null,
  };
}

/** Fastify's own body errors (bad JSON, unsupported content type, empty body). */
function isRequestShapeError(err: FastifyError): boolean {
  if (err.validation) return true;
  if (err instanceof SyntaxError && err.statusCode === 400) return true;
  return typeof err.code === 'string' && err.code.startsWith('FST_ERR_CTP_');
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    if (err instanceof AppError) {
      if (err.code === 'VALIDATION_ERROR') {
        log.warn('validation_error', { flow: 'http.error', message: err.message });
        return reply.status(err.status).send(buildValidationResponse(err.message));
      }

      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply
        .status(err.status)
        .headers(err.headers ?? {})
        .send(buildResponse(err.code, err.message));
    }

    if (isRequestShapeError(err)) {
      log.warn('validation_error', { flow: 'http.error', code: err.code, message: err.message });
      return reply.status(422).send(buildValidationResponse(err.message));
    }

    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
