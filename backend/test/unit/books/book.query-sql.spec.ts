import { describe, it, expect } from 'vitest';
import { searchBooksSql } from '../../../src/modules/books/dal/book.query-sql';
import { searchBooks } from '../../../src/modules/books/queries/book.queries';
import { BOOK_SORT_SAFELIST } from '../../../src/modules/books/book.constants';
import { validateFilters } from '../../../src/shared/query/filters';
import { createFakeDb } from '../../helpers/fake-db';
import { makeBookRow } from '../../helpers/fixtures';

const SELECT =
  'select count(*) over() as "total_records", "id", "title", "author", "published_year", ' +
  '"version", "created_at", "updated_at" from "books"';

function plan(sort: string, page = 1, pageSize = 20) {
  return validateFilters({ page, pageSize, sort }, { safelist: BOOK_SORT_SAFELIST });
}

describe('searchBooksSql', () => {
  it('omits the text predicate when both queries are empty', async () => {
    const fake = createFakeDb();

    await searchBooksSql(fake.db, { title: '', author: '', plan: plan('id') });

    expect(fake.queries).toEqual([
      { sql: `${SELECT} order by "id" asc limit $1 offset $2`, parameters: [20, 0] },
    ]);
  });

  it('binds search text as parameters and adds the id tiebreak', async () => {
    const fake = createFakeDb();

    await searchBooksSql(fake.db, {
      title: "darkness'; drop table books; --",
      author: '',
      plan: plan('-title', 3, 10),
    });

    expect(fake.queries).toEqual([
      {
        sql:
          `${SELECT} where to_tsvector('simple', "title") @@ plainto_tsquery('simple', $1) ` +
          'order by "title" desc, "id" asc limit $2 offset $3',
        parameters: ["darkness'; drop table books; --", 10, 20],
      },
    ]);
  });

  it('adds one predicate per non-empty field', async () => {
    const fake = createFakeDb();

    await searchBooksSql(fake.db, { title: 'left hand', author: 'le guin', plan: plan('published_year') });

    expect(fake.queries[0]).toEqual({
      sql:
        `${SELECT} where to_tsvector('simple', "title") @@ plainto_tsquery('simple', $1) ` +
        `and to_tsvector('simple', "author") @@ plainto_tsquery('simple', $2) ` +
        'order by "published_year" asc, "id" asc limit $3 offset $4',
      parameters: ['left hand', 'le guin', 20, 0],
    });
  });
});

describe('searchBooks', () => {
  it('builds metadata from the window count', async () => {
    const fake = createFakeDb(() => ({
      rows: [
        { ...makeBookRow({ id: 21 }), total_records: 57 },
        { ...makeBookRow({ id: 22, title: 'The Dispossessed', published_year: 1974 }), total_records: 57 },
      ],
    }));

    const page = await searchBooks(fake.db, { title: '', author: '', plan: plan('id', 2, 20) });

    expect(page.books.map((b) => b.id)).toEqual([21, 22]);
    expect(page.books[1]).toMatchObject({ title: 'The Dispossessed', publishedYear: 1974 });
    expect(page.metadata).toEqual({
      currentPage: 2,
      pageSize: 20,
      firstPage: 1,
      lastPage: 3,
      totalRecords: 57,
    });
  });

  it('returns an empty page with zero metadata when nothing matches', async () => {
    const fake = createFakeDb(() => ({ rows: [] }));

    const page = await searchBooks(fake.db, { title: 'nothing', author: '', plan: plan('id') });

    expect(page).toEqual({
      books: [],
      metadata: { currentPage: 0, pageSize: 0, firstPage: 0, lastPage: 0, totalRecords: 0 },
    });
  });
});
