/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - A stable requestId for logs and debugging.
 * - An AbortSignal per request: when the client goes away before the response
 *   is written, in-flight store calls are cancelled and open transactions roll back.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  signal: AbortSignal;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorated up front so Fastify knows the shape; assigned per request below.
  app.decorateRequest('requestContext', null);

  app.addHook('onRequest', (req: FastifyRequest, reply: FastifyReply, done) => {
    const controller = new AbortController();

    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    req.requestContext = {
      requestId: randomUUID(),
      signal: controller.signal,
    };

    done();
  });
}
