/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring (register, activate, login).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService, type AuthServiceDeps } from './auth.service';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: AuthServiceDeps) {
  const authService = new AuthService(deps);
  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
