/**
 * src/shared/db/migrations/0002_tokens.ts
 *
 * WHY:
 * - Bearer credentials are persisted as SHA-256 hashes only (never the raw token).
 * - Rows are keyed by hash; scope partitions activation vs authentication tokens.
 * - Deleting a user removes every credential it owns.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('tokens')
    .addColumn('hash', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'bigint', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('scope', 'text', (col) => col.notNull())
    .execute();

  await sql`
    ALTER TABLE tokens
      ADD CONSTRAINT tokens_scope_check
      CHECK (scope IN ('activation','authentication'));
  `.execute(db);

  // DeleteAllForSubject filters on (user_id, scope)
  await sql`CREATE INDEX tokens_user_id_scope_idx ON tokens(user_id, scope);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('tokens').ifExists().execute();
}
