/**
 * backend/src/modules/tokens/token.errors.ts
 *
 * WHY:
 * - Tokens module owns its semantic errors.
 *
 * RULES:
 * - notFound is the ONLY resolution failure. Wrong scope, expiry and unknown
 *   hash all produce it with the same message; meta carries no hint either.
 */

import { AppError } from '../../shared/http/errors';

export const TokenErrors = {
  notFound() {
    return AppError.notFound('token not found');
  },

  /** 128-bit collision: practically unreachable, safe for the client to retry. */
  hashCollision() {
    return AppError.conflict('token could not be issued, please retry');
  },

  generationFailed(meta?: { reason: string }) {
    return AppError.internal('token generation failed', meta);
  },
} as const;
