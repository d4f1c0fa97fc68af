/**
 * backend/src/modules/permissions/permission.types.ts
 *
 * Permission codes are seeded by migration 0003. Adding one means a new
 * migration plus an entry here.
 */

export const PERMISSION_CODES = ['books:read', 'books:write'] as const;
export type PermissionCode = (typeof PERMISSION_CODES)[number];

export function isPermissionCode(value: string): value is PermissionCode {
  return PERMISSION_CODES.some((c) => c === value);
}
