/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Shapes DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByEmailSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { PublicUser, User, UserWithPassword } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    activated: row.activated,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    activated: user.activated,
    createdAt: user.createdAt.toISOString(),
  };
}

export async function getUserByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserWithPassword | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return { ...toUser(row), passwordHash: row.password_hash };
}
