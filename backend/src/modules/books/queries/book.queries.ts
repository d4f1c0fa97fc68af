/**
 * backend/src/modules/books/queries/book.queries.ts
 *
 * WHY:
 * - Shapes book rows into domain types; builds page metadata from the
 *   windowed count.
 *
 * RULES:
 * - Read-only.
 * - No AppError. An empty result is a normal page, not a failure.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { calculateMetadata } from '../../../shared/query/pagination';
import { searchBooksSql, selectBookByIdSql, type BookRow } from '../dal/book.query-sql';
import type { SearchBooksParams } from '../dal/book.query-sql';
import type { Book, BookPage } from '../book.types';

export function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    publishedYear: row.published_year,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getBookById(db: DbExecutor, id: number): Promise<Book | undefined> {
  const row = await selectBookByIdSql(db, id);
  if (!row) return undefined;
  return toBook(row);
}

export async function searchBooks(db: DbExecutor, params: SearchBooksParams): Promise<BookPage> {
  const rows = await searchBooksSql(db, params);

  // Every row carries the same window total; none means nothing matched
  // (or the page is past the end).
  const totalRecords = rows[0]?.total_records ?? 0;

  return {
    books: rows.map(toBook),
    metadata: calculateMetadata(totalRecords, params.plan.page, params.plan.pageSize),
  };
}
