import { describe, it, expect } from 'vitest';
import { redactMeta } from '../../../../src/shared/http/error-handler';

describe('redactMeta', () => {
  it('masks sensitive keys and keeps the rest', () => {
    expect(
      redactMeta({ userId: 3, token: 'ABC', passwordHash: 'x', authorization: 'Bearer ABC', bookId: 7 }),
    ).toEqual({
      userId: 3,
      token: '[REDACTED]',
      passwordHash: '[REDACTED]',
      authorization: '[REDACTED]',
      bookId: 7,
    });
  });

  it('passes undefined through', () => {
    expect(redactMeta(undefined)).toBeUndefined();
  });
});
