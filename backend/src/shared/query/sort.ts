/**
 * backend/src/shared/query/sort.ts
 *
 * WHY:
 * - ORDER BY cannot be parameterized; the column must be part of the SQL text.
 * - Any client-chosen sort value is therefore checked against a closed,
 *   per-endpoint allow-list before it can influence query structure.
 *
 * RULES:
 * - The column handed to the query builder always comes from the safelist
 *   entry, never from the raw client string.
 * - A leading "-" means descending; no marker means ascending.
 *
 * HOW TO USE:
 *   const BOOK_SORT = defineSortSafelist(['id', 'title'] as const);
 *   const { column, direction } = validateSort(query.sort, BOOK_SORT);
 *   qb.orderBy(column, direction);
 */

import { QUERY_FIELD_MESSAGES, QueryErrors } from './query.errors';

export type SortDirection = 'asc' | 'desc';

export type SortEntry<C extends string> = Readonly<{
  value: string;
  column: C;
  direction: SortDirection;
}>;

export type SortSafelist<C extends string> = ReadonlyArray<SortEntry<C>>;

export type SortSpec<C extends string> = Readonly<{
  column: C;
  direction: SortDirection;
}>;

const DESCENDING_MARKER = '-';

/** Builds `col` and `-col` entries for every column. */
export function defineSortSafelist<C extends string>(columns: readonly C[]): SortSafelist<C> {
  return columns.flatMap((column) => [
    { value: column, column, direction: 'asc' as const },
    { value: `${DESCENDING_MARKER}${column}`, column, direction: 'desc' as const },
  ]);
}

export function findSortEntry<C extends string>(
  sort: string,
  safelist: SortSafelist<C>,
): SortEntry<C> | undefined {
  return safelist.find((e) => e.value === sort);
}

export function validateSort<C extends string>(sort: string, safelist: SortSafelist<C>): SortSpec<C> {
  const entry = findSortEntry(sort, safelist);
  if (!entry) {
    throw QueryErrors.invalidFilters({ sort: QUERY_FIELD_MESSAGES.sort });
  }
  return { column: entry.column, direction: entry.direction };
}
