/**
 * backend/src/shared/http/auth-context.errors.ts
 *
 * WHY:
 * - Authentication failures share one response per kind so callers
 *   learn nothing about why a token was rejected.
 * - `WWW-Authenticate: Bearer` accompanies every 401 (see error-handler).
 */

import { AppError } from './errors';

export const AUTH_CONTEXT_MESSAGES = {
  invalidToken: 'invalid or missing authentication token',
  authenticationRequired: 'you must be authenticated to access this resource',
  activationRequired: 'your user account must be activated to access this resource',
} as const;

export const AuthContextErrors = {
  invalidToken() {
    return AppError.unauthorized(AUTH_CONTEXT_MESSAGES.invalidToken);
  },

  authenticationRequired() {
    return AppError.unauthorized(AUTH_CONTEXT_MESSAGES.authenticationRequired);
  },

  activationRequired() {
    return AppError.forbidden(AUTH_CONTEXT_MESSAGES.activationRequired);
  },
} as const;
