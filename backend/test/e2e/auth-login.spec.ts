import { describe, it, expect } from 'vitest';
import { buildTestApp, createTestTokenStore, TEST_BCRYPT_COST } from '../helpers/build-test-app';
import type { RecordedQuery } from '../helpers/fake-db';
import { makeUser, makeUserRow } from '../helpers/fixtures';
import { TOKEN_PATTERN } from '../../src/modules/tokens';
import { BcryptPasswordHasher } from '../../src/shared/security/bcrypt-password-hasher';

/**
 * E2E tests for POST /v1/tokens/authentication.
 */

type LoginResponseBody = {
  authentication_token: { token: string; expiry: string };
};

type ErrorResponseBody = {
  error: { code: string; message: string };
};

function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

const PASSWORD = 'correct-test-password';

async function setup() {
  const passwordHash = await new BcryptPasswordHasher({ cost: TEST_BCRYPT_COST }).hash(PASSWORD);
  const { store } = createTestTokenStore(new Map([[3, makeUser({ id: 3 })]]));

  const handler = (q: RecordedQuery) => {
    if (q.sql === 'select * from "users" where "email" = $1') {
      return q.parameters[0] === 'ada@example.com'
        ? { rows: [makeUserRow({ id: 3, activated: true, password_hash: passwordHash })] }
        : { rows: [] };
    }
    if (q.sql.startsWith('select "permissions"."code"')) return { rows: [{ code: 'books:read' }] };
    return { rows: [] };
  };

  return { ...(await buildTestApp({ tokenStore: store, handler })), store };
}

describe('POST /v1/tokens/authentication', () => {
  it('issues an authentication token that then authenticates requests', async () => {
    const { app, store, close } = await setup();

    try {
      const before = Date.now();
      const res = await app.inject({
        method: 'POST',
        url: '/v1/tokens/authentication',
        payload: { email: 'ADA@example.com', password: PASSWORD },
      });

      expect(res.statusCode).toBe(201);
      const { authentication_token } = readJson<LoginResponseBody>(res);
      expect(authentication_token.token).toMatch(TOKEN_PATTERN);

      const expiry = Date.parse(authentication_token.expiry);
      expect(expiry - before).toBeGreaterThanOrEqual(24 * 60 * 60 * 1000);
      expect(expiry - Date.now()).toBeLessThanOrEqual(24 * 60 * 60 * 1000);
      expect(store.count({ userId: 3, scope: 'authentication' })).toBe(1);

      const list = await app.inject({
        method: 'GET',
        url: '/v1/books',
        headers: { authorization: `Bearer ${authentication_token.token}` },
      });
      expect(list.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('gives the same 401 for a wrong password and an unknown email', async () => {
    const { app, store, close } = await setup();

    try {
      for (const payload of [
        { email: 'ada@example.com', password: 'wrong-test-password' },
        { email: 'nobody@example.com', password: PASSWORD },
      ]) {
        const res = await app.inject({ method: 'POST', url: '/v1/tokens/authentication', payload });

        expect(res.statusCode).toBe(401);
        expect(res.headers['www-authenticate']).toBe('Bearer');
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          error: { code: 'UNAUTHORIZED', message: 'invalid authentication credentials' },
        });
      }
      expect(store.count()).toBe(0);
    } finally {
      await close();
    }
  });

  it('rejects malformed JSON as a client error', async () => {
    const { app, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/v1/tokens/authentication',
        headers: { 'content-type': 'application/json' },
        payload: '{"email":',
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});
