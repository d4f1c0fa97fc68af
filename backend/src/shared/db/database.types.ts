/**
 * backend/src/shared/db/database.types.ts
 *
 * WHY:
 * - Kysely needs a `DB` interface describing every table to type queries.
 * - Maintained by hand alongside the migrations in ./migrations.
 *
 * RULES:
 * - One interface per table, column names in snake_case (DB naming).
 * - Generated<T> for columns the DB fills in (serial ids, defaults).
 * - Keep in sync with migrations; nothing outside DAL should import these.
 */

import type { Generated } from 'kysely';

export interface Users {
  id: Generated<number>;
  name: string;
  email: string;
  password_hash: string;
  activated: boolean;
  version: Generated<number>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface Tokens {
  hash: string;
  user_id: number;
  expires_at: Date;
  scope: string;
}

export interface Permissions {
  id: Generated<number>;
  code: string;
}

export interface UsersPermissions {
  user_id: number;
  permission_id: number;
}

export interface Books {
  id: Generated<number>;
  title: string;
  author: string;
  published_year: number;
  version: Generated<number>;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface DB {
  users: Users;
  tokens: Tokens;
  permissions: Permissions;
  users_permissions: UsersPermissions;
  books: Books;
}
