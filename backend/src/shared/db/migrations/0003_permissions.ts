/**
 * src/shared/db/migrations/0003_permissions.ts
 *
 * WHY:
 * - Permission codes gate catalog reads/writes ("books:read", "books:write").
 * - Codes are seeded here; grants live in users_permissions.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('permissions')
    .addColumn('id', 'bigserial', (col) => col.primaryKey())
    .addColumn('code', 'text', (col) => col.notNull().unique())
    .execute();

  await db.schema
    .createTable('users_permissions')
    .addColumn('user_id', 'bigint', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('permission_id', 'bigint', (col) =>
      col.notNull().references('permissions.id').onDelete('cascade'),
    )
    .addPrimaryKeyConstraint('users_permissions_pkey', ['user_id', 'permission_id'])
    .execute();

  await sql`INSERT INTO permissions (code) VALUES ('books:read'), ('books:write');`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users_permissions').ifExists().execute();
  await db.schema.dropTable('permissions').ifExists().execute();
}
