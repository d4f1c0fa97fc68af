/**
 * backend/src/modules/books/book.service.ts
 *
 * WHY:
 * - Orchestrates catalog reads and writes.
 * - Only place in the module that talks to queries/DAL.
 *
 * RULES:
 * - Every store call runs under the store deadline and the request's signal.
 * - Updates are optimistic: read version -> conditional UPDATE. A lost race
 *   is reported as BookErrors.editConflict, never silently overwritten.
 * - No retries; the client decides.
 */

import type { DbExecutor } from '../../shared/db/db';
import { runWithDeadline } from '../../shared/db/deadline';
import type { Logger } from '../../shared/logger/logger';
import { validateFilters, type Filters } from '../../shared/query/filters';
import { BOOK_SORT_SAFELIST } from './book.constants';
import { BookErrors } from './book.errors';
import type { Book, BookPage, BookPatch, NewBook } from './book.types';
import type { BookRepo } from './dal/book.repo';
import { getBookById, searchBooks, toBook } from './queries/book.queries';

export type BookCallContext = {
  requestId: string;
  signal?: AbortSignal;
};

export type ListBooksParams = {
  title: string;
  author: string;
  filters: Filters;
};

export class BookService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      bookRepo: BookRepo;
      storeTimeoutMs: number;
      maxPageSize: number;
    },
  ) {}

  private run<T>(ctx: BookCallContext, op: () => Promise<T>): Promise<T> {
    return runWithDeadline(op, { timeoutMs: this.deps.storeTimeoutMs, signal: ctx.signal });
  }

  async listBooks(params: ListBooksParams, ctx: BookCallContext): Promise<BookPage> {
    // Rejects bad page/page_size/sort before any SQL is built.
    const plan = validateFilters(params.filters, {
      safelist: BOOK_SORT_SAFELIST,
      maxPageSize: this.deps.maxPageSize,
    });

    return this.run(ctx, () =>
      searchBooks(this.deps.db, { title: params.title, author: params.author, plan }),
    );
  }

  async getBook(id: number, ctx: BookCallContext): Promise<Book> {
    const book = await this.run(ctx, () => getBookById(this.deps.db, id));
    if (!book) throw BookErrors.notFound({ bookId: id });
    return book;
  }

  async createBook(input: NewBook, ctx: BookCallContext): Promise<Book> {
    const row = await this.run(ctx, () => this.deps.bookRepo.insertBook(input));

    this.deps.logger.info({
      msg: 'books.create.success',
      flow: 'books.create',
      requestId: ctx.requestId,
      bookId: row.id,
    });

    return toBook(row);
  }

  /**
   * @param expectedVersion version the client last saw (X-Expected-Version);
   *   when given it must equal the stored version.
   */
  async updateBook(
    id: number,
    patch: BookPatch,
    ctx: BookCallContext & { expectedVersion?: number },
  ): Promise<Book> {
    const current = await this.getBook(id, ctx);

    if (ctx.expectedVersion !== undefined && ctx.expectedVersion !== current.version) {
      this.logConflict(ctx, id, 'stale_expected_version');
      throw BookErrors.editConflict({ bookId: id });
    }

    const row = await this.run(ctx, () =>
      this.deps.bookRepo.updateBook({ id, expectedVersion: current.version, patch }),
    );

    if (!row) {
      this.logConflict(ctx, id, 'version_changed');
      throw BookErrors.editConflict({ bookId: id });
    }

    this.deps.logger.info({
      msg: 'books.update.success',
      flow: 'books.update',
      requestId: ctx.requestId,
      bookId: id,
      version: row.version,
    });

    return toBook(row);
  }

  async deleteBook(id: number, ctx: BookCallContext): Promise<Book> {
    const row = await this.run(ctx, () => this.deps.bookRepo.deleteBook(id));
    if (!row) throw BookErrors.notFound({ bookId: id });

    this.deps.logger.info({
      msg: 'books.delete.success',
      flow: 'books.delete',
      requestId: ctx.requestId,
      bookId: id,
    });

    return toBook(row);
  }

  private logConflict(ctx: BookCallContext, bookId: number, reason: string) {
    this.deps.logger.warn({
      msg: 'books.update.conflict',
      flow: 'books.update',
      requestId: ctx.requestId,
      bookId,
      reason,
    });
  }
}
