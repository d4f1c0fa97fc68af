/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 *
 * SECURITY:
 * - Login never says whether the email exists.
 * - An activation token that is unknown, expired or of another scope gets
 *   one message.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('invalid authentication credentials', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta, {
      email: 'a user with this email address already exists',
    });
  },

  activationTokenInvalid(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta, {
      token: 'invalid or expired activation token',
    });
  },

  /** The user row changed between token resolution and the activation write. */
  editConflict(meta?: AppErrorMeta) {
    return AppError.conflict(
      'unable to update the record due to an edit conflict, please try again',
      meta,
    );
  },
} as const;
