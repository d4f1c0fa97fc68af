/**
 * backend/src/modules/permissions/dal/permission.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for permissions.
 *
 * RULES:
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';

export async function selectPermissionCodesForUserSql(
  db: DbExecutor,
  userId: number,
): Promise<string[]> {
  const rows = await db
    .selectFrom('permissions')
    .innerJoin('users_permissions', 'users_permissions.permission_id', 'permissions.id')
    .select('permissions.code')
    .where('users_permissions.user_id', '=', userId)
    .orderBy('permissions.code')
    .execute();

  return rows.map((r) => r.code);
}

export async function selectPermissionIdsByCodesSql(
  db: DbExecutor,
  codes: readonly string[],
): Promise<number[]> {
  if (codes.length === 0) return [];

  const rows = await db
    .selectFrom('permissions')
    .select('id')
    .where('code', 'in', codes)
    .execute();

  return rows.map((r) => r.id);
}
