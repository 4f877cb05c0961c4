/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'INVALID_CREDENTIALS',
  'INVALID_TOKEN',
  'USER_NOT_FOUND',
  'DUPLICATE_EMAIL',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;
export type AppErrorHeaders = Readonly<Record<string, string>>;

/** Every 401 tells the client which scheme to retry with. */
export const BEARER_CHALLENGE: AppErrorHeaders = { 'WWW-Authenticate': 'Bearer' };

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly headers?: AppErrorHeaders;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    headers?: AppErrorHeaders;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.headers = opts.headers;
  }

  static unauthorized(message = 'Not authenticated', meta?: AppErrorMeta) {
    return new AppError({
      code: 'UNAUTHORIZED',
      status: 401,
      message,
      meta,
      headers: BEARER_CHALLENGE,
    });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  /**
   * Request shape errors. Rendered by the error handler as the
   * `{ status_code: 10422, message, data: null }` envelope.
   */
  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 422, message, meta });
  }
}
