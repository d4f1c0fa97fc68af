/**
 * src/shared/db/migrations/0004_books.ts
 *
 * WHY:
 * - Catalog records. `version` backs optimistic conflict detection on update.
 * - GIN indexes serve the `to_tsvector('simple', ...)` predicates used by search.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('books')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('author', 'text', (col) => col.notNull())
    .addColumn('published_year', 'integer', (col) => col.notNull())
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE books
      ADD CONSTRAINT books_published_year_check
      CHECK (published_year > 0);
  `.execute(db);

  await sql`CREATE INDEX books_title_idx ON books USING GIN (to_tsvector('simple', title));`.execute(
    db,
  );
  await sql`CREATE INDEX books_author_idx ON books USING GIN (to_tsvector('simple', author));`.execute(
    db,
  );
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('books').ifExists().execute();
}
