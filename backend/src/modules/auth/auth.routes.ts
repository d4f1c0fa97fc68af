/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 *
 * SECURITY:
 * - Tokens only in request bodies (never URL/query).
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/v1/users', controller.register.bind(controller));
  app.put('/v1/users/activated', controller.activate.bind(controller));
  app.post('/v1/tokens/authentication', controller.login.bind(controller));
}
