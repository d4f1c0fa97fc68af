/**
 * backend/src/shared/db/store.errors.ts
 *
 * WHY:
 * - Storage faults (deadline exceeded, request gone) are server-side problems.
 * - Clients only ever see a generic 500; details stay in `meta` (logs only).
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export const StoreErrors = {
  timeout(meta?: AppErrorMeta) {
    return AppError.timeout(meta);
  },

  /** The inbound request was aborted while a store call was in flight. */
  aborted(meta?: AppErrorMeta) {
    return AppError.internal('Request aborted', meta);
  },
} as const;
