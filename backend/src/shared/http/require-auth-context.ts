/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require user" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions. Permission checks that need
 *   storage live in the permissions module policy.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence (LOCKED):
 * 1) anonymous -> 401
 * 2) not activated -> 403
 */

import type { FastifyRequest } from 'fastify';
import { AuthContextErrors } from './auth-context.errors';
import type { User } from '../../modules/users';

export function requireAuthenticatedUser(req: FastifyRequest): User {
  const user = req.authContext?.user;
  if (!user) throw AuthContextErrors.authenticationRequired();
  return user;
}

export function requireActivatedUser(req: FastifyRequest): User {
  const user = requireAuthenticatedUser(req);
  if (!user.activated) throw AuthContextErrors.activationRequired();
  return user;
}
