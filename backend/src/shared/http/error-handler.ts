/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every endpoint answers failures with the same envelope:
 *   `{ error: { code, message, fields? } }`.
 *
 * RESPONSIBILITIES:
 * - AppError -> .status/.code (+ fields for validation errors).
 * - RateLimitError -> 429.
 * - Fastify client errors (bad JSON, wrong content type, body too large) -> 4xx.
 * - Unexpected errors and storage timeouts -> 500 INTERNAL with a generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log through withRequestContext(req) so requestId/userId are on every line.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError, type AppErrorFields } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';
import { REDACTED, SECRET_LOG_KEYS } from '../logger/logger';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    fields?: AppErrorFields;
  };
};

/** Error meta is logged nested under `meta`, below the logger's top-level masking. */
export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SECRET_LOG_KEYS.has(k) ? REDACTED : v;
  }
  return out;
}

function buildResponse(code: string, message: string, fields?: AppErrorFields): ErrorResponseBody {
  return fields ? { error: { code, message, fields } } : { error: { code, message } };
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      if (err.status >= 500) {
        log.error('app_error', {
          flow: 'http.error',
          code: err.code,
          status: err.status,
          message: err.message,
          meta: redactMeta(err.meta),
          stack: err.stack,
        });
        return reply.status(err.status).send(buildResponse('INTERNAL', 'Internal server error'));
      }

      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        fields: err.fields,
        meta: redactMeta(err.meta),
      });

      if (err.status === 401) reply.header('WWW-Authenticate', 'Bearer');

      return reply.status(err.status).send(buildResponse(err.code, err.message, err.fields));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      reply.header('Retry-After', String(err.windowSeconds));
      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Fastify client errors (body parsing, content type, payload size)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 4) Unexpected errors: generic body only
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
