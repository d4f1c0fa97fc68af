/**
 * backend/src/modules/permissions/permission.module.ts
 *
 * Support module (no routes). Books controller and auth flows consume it.
 */

import type { DbExecutor } from '../../shared/db/db';
import { PermissionRepo } from './dal/permission.repo';
import { PermissionService } from './permission.service';

export type PermissionModule = ReturnType<typeof createPermissionModule>;

export function createPermissionModule(deps: { db: DbExecutor; storeTimeoutMs: number }) {
  const permissionRepo = new PermissionRepo(deps.db);
  const permissionService = new PermissionService(deps);

  return {
    permissionRepo,
    permissionService,
  };
}
