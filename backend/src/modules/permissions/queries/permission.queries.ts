/**
 * backend/src/modules/permissions/queries/permission.queries.ts
 *
 * Read-only. Unknown codes in the table (added by a newer migration) are
 * dropped rather than trusted.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectPermissionCodesForUserSql } from '../dal/permission.query-sql';
import { isPermissionCode, type PermissionCode } from '../permission.types';

export async function getPermissionsForUser(
  db: DbExecutor,
  userId: number,
): Promise<PermissionCode[]> {
  const codes = await selectPermissionCodesForUserSql(db, userId);
  return codes.filter(isPermissionCode);
}
