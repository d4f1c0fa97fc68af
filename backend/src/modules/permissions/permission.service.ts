/**
 * backend/src/modules/permissions/permission.service.ts
 *
 * WHY:
 * - Loads a user's grants (under the store deadline) and applies the policy.
 * - Controllers call requirePermission() after requireActivatedUser().
 */

import type { DbExecutor } from '../../shared/db/db';
import { runWithDeadline } from '../../shared/db/deadline';
import type { User } from '../users';
import { assertHasPermission } from './policies/permission.policy';
import { getPermissionsForUser } from './queries/permission.queries';
import type { PermissionCode } from './permission.types';

export class PermissionService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      storeTimeoutMs: number;
    },
  ) {}

  async getPermissions(userId: number, opts?: { signal?: AbortSignal }): Promise<PermissionCode[]> {
    return runWithDeadline(() => getPermissionsForUser(this.deps.db, userId), {
      timeoutMs: this.deps.storeTimeoutMs,
      signal: opts?.signal,
    });
  }

  async requirePermission(
    user: User,
    code: PermissionCode,
    opts?: { signal?: AbortSignal },
  ): Promise<void> {
    const granted = await this.getPermissions(user.id, opts);
    assertHasPermission(granted, code, { userId: user.id });
  }
}
