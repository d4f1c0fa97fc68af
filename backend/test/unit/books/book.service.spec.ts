import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { BookService } from '../../../src/modules/books/book.service';
import { BookRepo } from '../../../src/modules/books/dal/book.repo';
import { createFakeDb, type QueryHandler } from '../../helpers/fake-db';
import { makeBookRow } from '../../helpers/fixtures';

function setup(handler: QueryHandler) {
  const fake = createFakeDb(handler);
  const logger = winston.createLogger({ silent: true });
  const service = new BookService({
    db: fake.db,
    logger,
    bookRepo: new BookRepo(fake.db),
    storeTimeoutMs: 1_000,
    maxPageSize: 100,
  });
  return { fake, logger, service };
}

const ctx = { requestId: 'req-1' };

describe('BookService.listBooks', () => {
  it('rejects an unlisted sort before any SQL runs', async () => {
    const { fake, service } = setup(() => ({ rows: [] }));

    await expect(
      service.listBooks(
        { title: '', author: '', filters: { page: 1, pageSize: 20, sort: 'price' } },
        ctx,
      ),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', fields: { sort: 'invalid sort value' } });
    expect(fake.queries).toEqual([]);
  });
});

describe('BookService.getBook', () => {
  it('maps a missing row to NOT_FOUND', async () => {
    const { service } = setup(() => ({ rows: [] }));
    await expect(service.getBook(99, ctx)).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'the requested resource could not be found',
    });
  });
});

describe('BookService.updateBook', () => {
  it('updates conditionally on the version it read', async () => {
    const { fake, service } = setup((q) =>
      q.sql.startsWith('update')
        ? { rows: [makeBookRow({ id: 7, title: 'Changed', version: 4 })] }
        : { rows: [makeBookRow({ id: 7, version: 3 })] },
    );

    const book = await service.updateBook(7, { title: 'Changed' }, ctx);

    expect(book).toMatchObject({ id: 7, title: 'Changed', version: 4 });
    expect(fake.queries[1]).toEqual({
      sql:
        'update "books" set "title" = $1, "version" = "version" + $2, "updated_at" = $3 ' +
        'where "id" = $4 and "version" = $5 returning *',
      parameters: ['Changed', 1, expect.any(Date), 7, 3],
    });
  });

  it('lets exactly one of two concurrent updates win', async () => {
    let updates = 0;
    const { logger, service } = setup((q) => {
      if (!q.sql.startsWith('update')) return { rows: [makeBookRow({ id: 7, version: 1 })] };
      updates += 1;
      // The second conditional UPDATE finds version 2 already in place.
      return updates === 1 ? { rows: [makeBookRow({ id: 7, title: 'A', version: 2 })] } : { rows: [] };
    });
    const warn = vi.spyOn(logger, 'warn');

    const results = await Promise.allSettled([
      service.updateBook(7, { title: 'A' }, ctx),
      service.updateBook(7, { title: 'B' }, ctx),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r) => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({
      reason: {
        code: 'CONFLICT',
        status: 409,
        message: 'unable to update the record due to an edit conflict, please try again',
      },
    });
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ msg: 'books.update.conflict', reason: 'version_changed', bookId: 7 }),
    );
  });

  it('refuses a stale expected version without writing', async () => {
    const { fake, service } = setup(() => ({ rows: [makeBookRow({ id: 7, version: 5 })] }));

    await expect(
      service.updateBook(7, { author: 'Someone' }, { ...ctx, expectedVersion: 4 }),
    ).rejects.toMatchObject({ code: 'CONFLICT' });
    expect(fake.queries).toHaveLength(1);
    expect(fake.queries[0]?.sql.startsWith('select')).toBe(true);
  });
});

describe('BookService.deleteBook', () => {
  it('deletes by id and returns the removed book', async () => {
    const { fake, service } = setup(() => ({ rows: [makeBookRow({ id: 3, title: 'Kindred' })] }));

    const book = await service.deleteBook(3, ctx);

    expect(book).toMatchObject({ id: 3, title: 'Kindred' });
    expect(fake.queries).toEqual([
      { sql: 'delete from "books" where "id" = $1 returning *', parameters: [3] },
    ]);
  });

  it('reports NOT_FOUND when nothing was deleted', async () => {
    const { service } = setup(() => ({ rows: [] }));
    await expect(service.deleteBook(3, ctx)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});
