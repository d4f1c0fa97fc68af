/**
 * backend/src/shared/query/query.errors.ts
 *
 * WHY:
 * - Listing endpoints reject bad filter input with field-level detail.
 * - One error can carry several fields (page + sort wrong at once).
 */

import { AppError, type AppErrorFields } from '../http/errors';

export const QueryErrors = {
  invalidFilters(fields: AppErrorFields) {
    return AppError.validationError('Invalid query parameters', undefined, fields);
  },
} as const;

export const QUERY_FIELD_MESSAGES = {
  sort: 'invalid sort value',
  pageMin: 'must be greater than zero',
  pageMax: 'must be a maximum of 10 million',
  pageSizeMin: 'must be greater than zero',
  pageSizeMax: (max: number) => `must be a maximum of ${max}`,
} as const;
