import { describe, it, expect } from 'vitest';
import { assertHasPermission } from '../../../src/modules/permissions/policies/permission.policy';
import { AppError } from '../../../src/shared/http/errors';

describe('assertHasPermission', () => {
  it('passes when the code is granted', () => {
    expect(() => assertHasPermission(['books:read', 'books:write'], 'books:write')).not.toThrow();
  });

  it('throws 403 naming the missing permission in meta only', () => {
    try {
      assertHasPermission(['books:read'], 'books:write', { userId: 4 });
      expect.fail('expected assertHasPermission to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.status).toBe(403);
      expect(e.code).toBe('FORBIDDEN');
      expect(e.message).toBe(
        'your user account does not have the necessary permissions to access this resource',
      );
      expect(e.meta).toEqual({ userId: 4, permission: 'books:write' });
      expect(e.fields).toBeUndefined();
    }
  });

  it('treats no grants as no access', () => {
    expect(() => assertHasPermission([], 'books:read')).toThrowError(AppError);
  });
});
