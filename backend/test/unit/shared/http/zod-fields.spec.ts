import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { invalidRequest, issuesToFields } from '../../../../src/shared/http/zod-fields';

describe('issuesToFields', () => {
  const schema = z
    .object({
      name: z.string().min(1, 'must be provided'),
      email: z.string().email('must be a valid email address'),
    })
    .strict();

  it('maps each failing path to its first message', () => {
    const parsed = schema.safeParse({ name: '', email: 'nope' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    expect(issuesToFields(parsed.error.issues)).toEqual({
      name: 'must be provided',
      email: 'must be a valid email address',
    });
  });

  it('reports path-less issues under "body"', () => {
    const parsed = schema.safeParse({ name: 'Ada', email: 'ada@example.com', extra: true });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    expect(Object.keys(issuesToFields(parsed.error.issues))).toEqual(['body']);
  });

  it('keeps only the first issue for a repeated field', () => {
    const twoChecks = z.object({ pw: z.string().min(8, 'too short').regex(/\d/, 'needs a digit') });
    const parsed = twoChecks.safeParse({ pw: 'abc' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    expect(issuesToFields(parsed.error.issues)).toEqual({ pw: 'too short' });
  });
});

describe('invalidRequest', () => {
  it('builds a 400 carrying fields and the raw issues in meta', () => {
    const parsed = z.object({ title: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const err = invalidRequest('Invalid request body', parsed.error.issues);
    expect(err.status).toBe(400);
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('Invalid request body');
    expect(err.fields).toEqual({ title: 'Required' });
    expect(err.meta).toEqual({ issues: parsed.error.issues });
  });
});
