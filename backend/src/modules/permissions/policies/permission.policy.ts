/**
 * backend/src/modules/permissions/policies/permission.policy.ts
 *
 * WHY:
 * - The "does this user hold code X" decision, kept pure for unit tests.
 *
 * RULES:
 * - Pure functions only.
 * - Throws PermissionErrors.
 */

import { PermissionErrors } from '../permission.errors';
import type { PermissionCode } from '../permission.types';

export function assertHasPermission(
  granted: readonly PermissionCode[],
  required: PermissionCode,
  meta?: { userId: number },
): void {
  if (!granted.includes(required)) {
    throw PermissionErrors.notPermitted({ ...meta, permission: required });
  }
}
