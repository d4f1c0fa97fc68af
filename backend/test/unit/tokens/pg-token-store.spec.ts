import { describe, it, expect } from 'vitest';
import { PgTokenStore, TokenCodec } from '../../../src/modules/tokens';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';
import { createFakeDb, pgError } from '../../helpers/fake-db';
import { makeUserRow } from '../../helpers/fixtures';

const TOKEN = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

function setup(handler?: Parameters<typeof createFakeDb>[0]) {
  const fake = createFakeDb(handler);
  const codec = new TokenCodec(new Sha256TokenHasher());
  const store = new PgTokenStore(fake.db, codec, { timeoutMs: 1_000 });
  return { fake, codec, store };
}

describe('PgTokenStore', () => {
  it('inserts the hash, never the plaintext', async () => {
    const { fake, store } = setup();
    const expiresAt = new Date('2025-03-01T00:00:00.000Z');

    await store.insert({ hash: 'h'.repeat(64), userId: 3, scope: 'activation', expiresAt });

    expect(fake.queries).toEqual([
      {
        sql: 'insert into "tokens" ("hash", "user_id", "expires_at", "scope") values ($1, $2, $3, $4)',
        parameters: ['h'.repeat(64), 3, expiresAt, 'activation'],
      },
    ]);
  });

  it('maps a unique violation to CONFLICT', async () => {
    const { store } = setup(() => {
      throw pgError('23505', 'tokens_pkey');
    });

    await expect(
      store.insert({ hash: 'h', userId: 3, scope: 'activation', expiresAt: new Date() }),
    ).rejects.toMatchObject({ code: 'CONFLICT', status: 409 });
  });

  it('resolves by hash, scope and database-clock expiry', async () => {
    const { fake, codec, store } = setup(() => ({ rows: [makeUserRow({ id: 9, activated: true })] }));

    const user = await store.resolve('authentication', TOKEN);

    expect(user).toMatchObject({ id: 9, email: 'ada@example.com', activated: true });
    expect(user).not.toHaveProperty('passwordHash');
    expect(fake.queries).toEqual([
      {
        sql:
          'select "users".* from "users" inner join "tokens" on "tokens"."user_id" = "users"."id" ' +
          'where "tokens"."hash" = $1 and "tokens"."scope" = $2 and "tokens"."expires_at" > now()',
        parameters: [codec.hash(TOKEN), 'authentication'],
      },
    ]);
  });

  it('throws NOT_FOUND when no row matches', async () => {
    const { store } = setup(() => ({ rows: [] }));
    await expect(store.resolve('authentication', TOKEN)).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('maps a statement timeout to TIMEOUT', async () => {
    const { store } = setup(() => {
      throw pgError('57014');
    });
    await expect(store.resolve('authentication', TOKEN)).rejects.toMatchObject({ code: 'TIMEOUT' });
  });

  it('deletes every token of one scope for a user, zero rows included', async () => {
    const { fake, store } = setup(() => ({ numAffectedRows: 0n }));

    await expect(store.deleteAllForSubject(5, 'activation')).resolves.toBeUndefined();
    expect(fake.queries).toEqual([
      { sql: 'delete from "tokens" where "user_id" = $1 and "scope" = $2', parameters: [5, 'activation'] },
    ]);
  });

  it('does not touch the database once the caller has gone away', async () => {
    const { fake, store } = setup();
    const ctrl = new AbortController();
    ctrl.abort();

    await expect(store.resolve('authentication', TOKEN, { signal: ctrl.signal })).rejects.toMatchObject({
      code: 'INTERNAL',
    });
    expect(fake.queries).toEqual([]);
  });
});
