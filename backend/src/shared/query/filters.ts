/**
 * backend/src/shared/query/filters.ts
 *
 * WHY:
 * - A listing request carries page, page_size and sort together.
 * - Validating them as one unit reports every bad field in a single 400
 *   and hands the query builder a ready plan (limit/offset + sort spec).
 *
 * HOW TO USE:
 *   const plan = validateFilters(
 *     { page, pageSize, sort },
 *     { safelist: BOOK_SORT_SAFELIST, maxPageSize: config.pagination.maxPageSize },
 *   );
 */

import { findSortEntry, type SortSafelist, type SortSpec } from './sort';
import { DEFAULT_MAX_PAGE_SIZE, pageFieldErrors, planPage, type PagePlan } from './pagination';
import { QUERY_FIELD_MESSAGES, QueryErrors } from './query.errors';

export type Filters = Readonly<{
  page: number;
  pageSize: number;
  sort: string;
}>;

export type FilterPlan<C extends string> = Readonly<{
  page: number;
  pageSize: number;
  sort: SortSpec<C>;
  limit: PagePlan['limit'];
  offset: PagePlan['offset'];
}>;

export function validateFilters<C extends string>(
  filters: Filters,
  opts: { safelist: SortSafelist<C>; maxPageSize?: number },
): FilterPlan<C> {
  const maxPageSize = opts.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE;
  const fields = pageFieldErrors(filters.page, filters.pageSize, maxPageSize);

  const entry = findSortEntry(filters.sort, opts.safelist);
  if (!entry) fields.sort = QUERY_FIELD_MESSAGES.sort;

  if (!entry || Object.keys(fields).length > 0) {
    throw QueryErrors.invalidFilters(fields);
  }

  const { limit, offset } = planPage(filters.page, filters.pageSize, maxPageSize);

  return {
    page: filters.page,
    pageSize: filters.pageSize,
    sort: { column: entry.column, direction: entry.direction },
    limit,
    offset,
  };
}
