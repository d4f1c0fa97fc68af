/**
 * backend/src/modules/books/dal/book.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for books.
 *
 * RULES:
 * - updateBook is conditional on the version the caller read; no row back
 *   means someone else wrote first (or the row is gone).
 * - No transactions started here; supports withDb() for tx binding.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { BookPatch, NewBook } from '../book.types';
import type { BookRow } from './book.query-sql';

export class BookRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): BookRepo {
    return new BookRepo(db);
  }

  async insertBook(book: NewBook): Promise<BookRow> {
    return this.db
      .insertInto('books')
      .values({
        title: book.title,
        author: book.author,
        published_year: book.publishedYear,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async updateBook(params: {
    id: number;
    expectedVersion: number;
    patch: BookPatch;
  }): Promise<BookRow | undefined> {
    const { patch } = params;

    return this.db
      .updateTable('books')
      .set((eb) => ({
        ...(patch.title !== undefined ? { title: patch.title } : {}),
        ...(patch.author !== undefined ? { author: patch.author } : {}),
        ...(patch.publishedYear !== undefined ? { published_year: patch.publishedYear } : {}),
        version: eb('version', '+', 1),
        updated_at: new Date(),
      }))
      .where('id', '=', params.id)
      .where('version', '=', params.expectedVersion)
      .returningAll()
      .executeTakeFirst();
  }

  /** The removed row, or undefined when there was none. */
  async deleteBook(id: number): Promise<BookRow | undefined> {
    return this.db.deleteFrom('books').where('id', '=', id).returningAll().executeTakeFirst();
  }
}
