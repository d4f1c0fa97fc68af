/**
 * backend/src/modules/permissions/dal/permission.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for permission grants.
 *
 * RULES:
 * - Granting is idempotent (ON CONFLICT DO NOTHING).
 * - No transactions started here; supports withDb() for tx binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectPermissionIdsByCodesSql } from './permission.query-sql';

export class PermissionRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): PermissionRepo {
    return new PermissionRepo(db);
  }

  async grantToUser(userId: number, codes: readonly string[]): Promise<void> {
    const ids = await selectPermissionIdsByCodesSql(this.db, codes);
    if (ids.length === 0) return;

    await this.db
      .insertInto('users_permissions')
      .values(ids.map((permissionId) => ({ user_id: userId, permission_id: permissionId })))
      .onConflict((oc) => oc.doNothing())
      .execute();
  }
}
