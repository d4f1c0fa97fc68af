/**
 * backend/src/modules/books/book.constants.ts
 */

import { defineSortSafelist } from '../../shared/query/sort';

/** Columns a client may sort the catalog by. Anything else is rejected. */
export const BOOK_SORT_COLUMNS = ['id', 'title', 'author', 'published_year'] as const;
export type BookSortColumn = (typeof BOOK_SORT_COLUMNS)[number];

export const BOOK_SORT_SAFELIST = defineSortSafelist(BOOK_SORT_COLUMNS);

export const BOOK_LIST_DEFAULTS = {
  page: 1,
  pageSize: 20,
  sort: 'id',
} as const;

export const BOOK_TEXT_MAX_BYTES = 100;

export const BOOKS_BASE_PATH = '/v1/books';
