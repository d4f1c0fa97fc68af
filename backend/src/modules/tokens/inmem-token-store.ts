/**
 * backend/src/modules/tokens/inmem-token-store.ts
 *
 * WHY:
 * - TokenStore without Postgres, for tests and local tooling.
 * - Same contract as PgTokenStore, including the single notFound failure.
 *
 * HOW TO USE:
 *   const store = new InMemTokenStore({ codec, lookupSubject: (id) => users.get(id) });
 */

import type { UserId } from '../users';
import type { TokenCodec } from './token.codec';
import { TokenErrors } from './token.errors';
import type { StoreCallOptions, TokenStore } from './token.store';
import type { Credential, TokenScope, TokenSubject } from './token.types';

export class InMemTokenStore implements TokenStore {
  private readonly byHash = new Map<string, Credential>();

  constructor(
    private readonly deps: {
      codec: TokenCodec;
      lookupSubject: (userId: UserId) => TokenSubject | undefined;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  insert(credential: Credential, opts?: StoreCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted();
    if (this.byHash.has(credential.hash)) {
      return Promise.reject(TokenErrors.hashCollision());
    }
    this.byHash.set(credential.hash, credential);
    return Promise.resolve();
  }

  resolve(scope: TokenScope, plaintext: string, opts?: StoreCallOptions): Promise<TokenSubject> {
    opts?.signal?.throwIfAborted();
    const credential = this.byHash.get(this.deps.codec.hash(plaintext));

    if (
      !credential ||
      credential.scope !== scope ||
      credential.expiresAt.getTime() <= this.now().getTime()
    ) {
      return Promise.reject(TokenErrors.notFound());
    }

    const subject = this.deps.lookupSubject(credential.userId);
    if (!subject) return Promise.reject(TokenErrors.notFound());

    return Promise.resolve(subject);
  }

  deleteAllForSubject(userId: UserId, scope: TokenScope, opts?: StoreCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted();
    for (const [hash, c] of this.byHash) {
      if (c.userId === userId && c.scope === scope) this.byHash.delete(hash);
    }
    return Promise.resolve();
  }

  /** Number of stored credentials, optionally for one user/scope. */
  count(filter?: { userId?: UserId; scope?: TokenScope }): number {
    let n = 0;
    for (const c of this.byHash.values()) {
      if (filter?.userId !== undefined && c.userId !== filter.userId) continue;
      if (filter?.scope !== undefined && c.scope !== filter.scope) continue;
      n++;
    }
    return n;
  }
}
