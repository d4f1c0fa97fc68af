/**
 * backend/src/modules/permissions/index.ts
 *
 * Public surface of the permissions module.
 */

export { createPermissionModule, type PermissionModule } from './permission.module';
export { PermissionService } from './permission.service';
export { PermissionRepo } from './dal/permission.repo';
export { PermissionErrors } from './permission.errors';
export { assertHasPermission } from './policies/permission.policy';
export { PERMISSION_CODES, isPermissionCode, type PermissionCode } from './permission.types';
