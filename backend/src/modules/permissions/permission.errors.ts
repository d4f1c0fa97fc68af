/**
 * backend/src/modules/permissions/permission.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PermissionErrors = {
  notPermitted(meta?: AppErrorMeta) {
    return AppError.forbidden(
      'your user account does not have the necessary permissions to access this resource',
      meta,
    );
  },
} as const;
