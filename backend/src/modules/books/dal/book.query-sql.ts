/**
 * backend/src/modules/books/dal/book.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for books, including the catalog search.
 *
 * SEARCH (one statement):
 * - count(*) over() returns the filtered total with every row, so the page
 *   and its count come from the same snapshot.
 * - A text predicate is added only for a non-empty query; empty = match all.
 * - ORDER BY the safelisted column, then id ASC so pages never overlap or
 *   skip rows when the sort column has duplicates.
 *
 * RULES:
 * - User text only ever reaches SQL as a bound parameter.
 * - The sort column comes typed from the safelist (FilterPlan), never raw.
 * - No AppError.
 */

import { sql, type Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { Books } from '../../../shared/db/database.types';
import type { FilterPlan } from '../../../shared/query/filters';
import type { BookSortColumn } from '../book.constants';

export type BookRow = Selectable<Books>;
export type BookSearchRow = BookRow & { total_records: number };

export type SearchBooksParams = {
  title: string;
  author: string;
  plan: FilterPlan<BookSortColumn>;
};

const BOOK_COLUMNS = [
  'id',
  'title',
  'author',
  'published_year',
  'version',
  'created_at',
  'updated_at',
] as const;

function matchesText(column: 'title' | 'author', query: string) {
  return sql<boolean>`to_tsvector('simple', ${sql.ref(column)}) @@ plainto_tsquery('simple', ${query})`;
}

export async function searchBooksSql(
  db: DbExecutor,
  params: SearchBooksParams,
): Promise<BookSearchRow[]> {
  const { plan } = params;

  let qb = db
    .selectFrom('books')
    .select((eb) => eb.fn.countAll<number>().over().as('total_records'))
    .select(BOOK_COLUMNS);

  if (params.title !== '') qb = qb.where(matchesText('title', params.title));
  if (params.author !== '') qb = qb.where(matchesText('author', params.author));

  qb = qb.orderBy(plan.sort.column, plan.sort.direction);
  if (plan.sort.column !== 'id') qb = qb.orderBy('id', 'asc');

  return qb.limit(plan.limit).offset(plan.offset).execute();
}

export async function selectBookByIdSql(
  db: DbExecutor,
  id: number,
): Promise<BookRow | undefined> {
  return db.selectFrom('books').select(BOOK_COLUMNS).where('id', '=', id).executeTakeFirst();
}
