/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  activate: {
    perIp: { limit: 10, windowSeconds: 900 },
  },
} as const;

/** Granted to every new account in the registration transaction. */
export const REGISTER_DEFAULT_PERMISSIONS = ['books:read'] as const;

/** bcrypt ignores everything past 72 bytes. */
export const PASSWORD_MAX_BYTES = 72;
export const PASSWORD_MIN_CHARS = 8;
export const NAME_MAX_BYTES = 500;
