/**
 * backend/src/modules/tokens/token.module.ts
 *
 * WHY:
 * - Wires codec + store. Support module, no routes.
 *
 * RULES:
 * - A store override (tests) replaces the Postgres store for standalone calls;
 *   forTransaction() always binds the Postgres store to the given trx.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { UserId } from '../users';
import { PgTokenStore } from './pg-token-store';
import { TokenCodec } from './token.codec';
import type { StoreCallOptions, TokenStore } from './token.store';
import type { TokenScope } from './token.types';

export type TokenModule = ReturnType<typeof createTokenModule>;

export function createTokenModule(deps: {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  storeTimeoutMs: number;
  tokenStore?: TokenStore;
  codec?: TokenCodec;
}) {
  const codec = deps.codec ?? new TokenCodec(deps.tokenHasher);
  const pgStore = new PgTokenStore(deps.db, codec, { timeoutMs: deps.storeTimeoutMs });
  const store: TokenStore = deps.tokenStore ?? pgStore;

  /** Issue + persist. Returns the plaintext; it is not recoverable afterwards. */
  async function newToken(
    input: { userId: UserId; ttlMs: number; scope: TokenScope },
    opts?: StoreCallOptions & { store?: TokenStore },
  ): Promise<{ plaintext: string; expiresAt: Date }> {
    const issued = codec.issue(input);
    await (opts?.store ?? store).insert(issued.credential, opts);
    return { plaintext: issued.plaintext, expiresAt: issued.credential.expiresAt };
  }

  return {
    codec,
    store,
    newToken,
    forTransaction: (trx: DbExecutor): TokenStore => pgStore.withDb(trx),
  };
}
