/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1) request context (requestId + abort signal)
 * 2) request log line
 * 3) auth context (bearer token -> user), may reject with 401
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';

const BODY_LIMIT_BYTES = 1_048_576;

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: BODY_LIMIT_BYTES,
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { flow: 'http.request' });
    done();
  });

  registerAuthContext(app, { tokenStore: opts.deps.tokens.store });
  registerErrorHandler(app);

  return app;
}
