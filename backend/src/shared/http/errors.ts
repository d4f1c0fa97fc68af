/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 * - Failure kinds are discriminated by `code` (structural), never by
 *   comparing against shared error instances.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. books/book.errors.ts).
 * - `meta` is for logs only; `fields` is client-facing validation detail.
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'RATE_LIMITED',
  'CONFLICT',
  'TIMEOUT',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

/** Field name -> human readable problem, e.g. `{ sort: 'invalid sort value' }`. */
export type AppErrorFields = Record<string, string>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly fields?: AppErrorFields;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    fields?: AppErrorFields;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.fields = opts.fields;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(
    message = 'Validation error',
    meta?: AppErrorMeta,
    fields?: AppErrorFields,
  ) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta, fields });
  }

  static rateLimited(meta?: AppErrorMeta) {
    return new AppError({ code: 'RATE_LIMITED', status: 429, message: 'Rate limited', meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta });
  }

  /** Deadline exceeded talking to storage. Reported to clients as a generic server fault. */
  static timeout(meta?: AppErrorMeta) {
    return new AppError({ code: 'TIMEOUT', status: 500, message: 'Internal server error', meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}

export function isAppError(err: unknown, code?: AppErrorCode): err is AppError {
  if (!(err instanceof AppError)) return false;
  return code === undefined || err.code === code;
}
