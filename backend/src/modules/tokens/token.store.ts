/**
 * backend/src/modules/tokens/token.store.ts
 *
 * WHY:
 * - Auth context and flows depend on this contract, not on Postgres.
 *   Tests swap in InMemTokenStore.
 *
 * CONTRACT:
 * - insert: hash collision -> TokenErrors.hashCollision (CONFLICT).
 * - resolve: match on hash AND scope AND expires_at > now; anything else
 *   -> TokenErrors.notFound, indistinguishable by cause.
 * - deleteAllForSubject: idempotent; zero rows is not an error.
 * - Every call is bounded by the store deadline; an aborted `signal`
 *   cancels it.
 */

import type { UserId } from '../users';
import type { Credential, TokenScope, TokenSubject } from './token.types';

export type StoreCallOptions = {
  signal?: AbortSignal;
};

export interface TokenStore {
  insert(credential: Credential, opts?: StoreCallOptions): Promise<void>;
  resolve(scope: TokenScope, plaintext: string, opts?: StoreCallOptions): Promise<TokenSubject>;
  deleteAllForSubject(userId: UserId, scope: TokenScope, opts?: StoreCallOptions): Promise<void>;
}
