/**
 * backend/src/modules/books/book.errors.ts
 *
 * WHY:
 * - Books module owns its semantic errors.
 * - editConflict is retryable: re-read the book and reapply the change.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const BookErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('the requested resource could not be found', meta);
  },

  editConflict(meta?: AppErrorMeta) {
    return AppError.conflict(
      'unable to update the record due to an edit conflict, please try again',
      meta,
    );
  },
} as const;
