/**
 * backend/src/shared/query/pagination.ts
 *
 * WHY:
 * - Turns client page/page_size into bounded LIMIT/OFFSET.
 * - Computes page metadata from the windowed count returned with the page.
 *
 * RULES:
 * - calculateMetadata is pure; an empty result has no pages (all zeros).
 */

import type { AppErrorFields } from '../http/errors';
import { QUERY_FIELD_MESSAGES, QueryErrors } from './query.errors';

export const DEFAULT_MAX_PAGE_SIZE = 100;
export const MAX_PAGE = 10_000_000;

export type PagePlan = Readonly<{
  limit: number;
  offset: number;
}>;

export type Metadata = Readonly<{
  currentPage: number;
  pageSize: number;
  firstPage: number;
  lastPage: number;
  totalRecords: number;
}>;

export const EMPTY_METADATA: Metadata = {
  currentPage: 0,
  pageSize: 0,
  firstPage: 0,
  lastPage: 0,
  totalRecords: 0,
};

/**
 * Field errors for page/page_size. Empty object means valid.
 * Exposed so listing filters can report every bad field at once.
 */
export function pageFieldErrors(
  page: number,
  pageSize: number,
  maxPageSize = DEFAULT_MAX_PAGE_SIZE,
): AppErrorFields {
  const fields: AppErrorFields = {};

  if (!Number.isInteger(page) || page < 1) fields.page = QUERY_FIELD_MESSAGES.pageMin;
  else if (page > MAX_PAGE) fields.page = QUERY_FIELD_MESSAGES.pageMax;

  if (!Number.isInteger(pageSize) || pageSize < 1) {
    fields.page_size = QUERY_FIELD_MESSAGES.pageSizeMin;
  } else if (pageSize > maxPageSize) {
    fields.page_size = QUERY_FIELD_MESSAGES.pageSizeMax(maxPageSize);
  }

  return fields;
}

export function planPage(
  page: number,
  pageSize: number,
  maxPageSize = DEFAULT_MAX_PAGE_SIZE,
): PagePlan {
  const fields = pageFieldErrors(page, pageSize, maxPageSize);
  if (Object.keys(fields).length > 0) throw QueryErrors.invalidFilters(fields);

  return { limit: pageSize, offset: (page - 1) * pageSize };
}

export function calculateMetadata(totalRecords: number, page: number, pageSize: number): Metadata {
  if (totalRecords === 0) return EMPTY_METADATA;

  return {
    currentPage: page,
    pageSize,
    firstPage: 1,
    lastPage: Math.ceil(totalRecords / pageSize),
    totalRecords,
  };
}
