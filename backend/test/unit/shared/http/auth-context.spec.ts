import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { authenticate, parseBearer } from '../../../../src/shared/http/auth-context';
import { HOUR_MS, type TokenStore } from '../../../../src/modules/tokens';
import { createTestTokenStore } from '../../../helpers/build-test-app';
import { makeUser } from '../../../helpers/fixtures';

const VALID = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

function makeReq(authorization?: string): FastifyRequest {
  return {
    headers: authorization === undefined ? {} : { authorization },
    requestContext: { requestId: 'req-1', signal: new AbortController().signal },
  } as unknown as FastifyRequest;
}

describe('parseBearer', () => {
  it('treats an absent or empty header as missing', () => {
    expect(parseBearer(undefined)).toEqual({ kind: 'missing' });
    expect(parseBearer('')).toEqual({ kind: 'missing' });
  });

  it('extracts a well-formed token', () => {
    expect(parseBearer(`Bearer ${VALID}`)).toEqual({ kind: 'token', token: VALID });
  });

  it('flags everything else as malformed', () => {
    for (const header of [
      VALID,
      `Basic ${VALID}`,
      `bearer ${VALID}`,
      'Bearer ',
      `Bearer ${VALID.slice(1)}`,
      `Bearer ${VALID}A`,
      `Bearer ${VALID.toLowerCase()}`,
      `Bearer ${VALID.slice(0, 25)}1`,
      `Bearer  ${VALID}`,
    ]) {
      expect(parseBearer(header)).toEqual({ kind: 'malformed' });
    }
  });
});

describe('authenticate', () => {
  it('returns null without an Authorization header', async () => {
    const { store } = createTestTokenStore();
    await expect(authenticate(makeReq(), store)).resolves.toBeNull();
  });

  it('resolves the user behind an authentication token', async () => {
    const user = makeUser({ id: 7 });
    const { codec, store } = createTestTokenStore(new Map([[7, user]]));
    const issued = codec.issue({ userId: 7, ttlMs: HOUR_MS, scope: 'authentication' });
    await store.insert(issued.credential);

    await expect(authenticate(makeReq(`Bearer ${issued.plaintext}`), store)).resolves.toBe(user);
  });

  it('rejects malformed headers, unknown tokens and activation tokens with the same 401', async () => {
    const user = makeUser({ id: 7 });
    const { codec, store } = createTestTokenStore(new Map([[7, user]]));
    const activation = codec.issue({ userId: 7, ttlMs: HOUR_MS, scope: 'activation' });
    await store.insert(activation.credential);

    for (const header of ['Token abc', `Bearer ${VALID}`, `Bearer ${activation.plaintext}`]) {
      await expect(authenticate(makeReq(header), store)).rejects.toMatchObject({
        status: 401,
        code: 'UNAUTHORIZED',
        message: 'invalid or missing authentication token',
      });
    }
  });

  it('lets store failures through as they are', async () => {
    const failing: TokenStore = {
      insert: () => Promise.resolve(),
      resolve: () => Promise.reject(new Error('connection reset')),
      deleteAllForSubject: () => Promise.resolve(),
    };

    await expect(authenticate(makeReq(`Bearer ${VALID}`), failing)).rejects.toThrowError(
      'connection reset',
    );
  });
});
