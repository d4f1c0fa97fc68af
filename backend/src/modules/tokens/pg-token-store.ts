/**
 * backend/src/modules/tokens/pg-token-store.ts
 *
 * WHY:
 * - Postgres TokenStore over Kysely.
 *
 * RULES:
 * - Each call is one independent statement; no multi-statement tx needed
 *   because rows are keyed by hash.
 * - Bound to a transaction via withDb(trx) when a flow issues a token as
 *   part of a larger write (registration).
 */

import type { DbExecutor } from '../../shared/db/db';
import { runWithDeadline } from '../../shared/db/deadline';
import { isUniqueViolation } from '../../shared/db/pg-errors';
import { toUser, type UserId } from '../users';
import { selectUserByTokenSql } from './dal/token.query-sql';
import { TokenRepo } from './dal/token.repo';
import type { TokenCodec } from './token.codec';
import { TokenErrors } from './token.errors';
import type { StoreCallOptions, TokenStore } from './token.store';
import type { Credential, TokenScope, TokenSubject } from './token.types';

export class PgTokenStore implements TokenStore {
  private readonly repo: TokenRepo;

  constructor(
    private readonly db: DbExecutor,
    private readonly codec: TokenCodec,
    private readonly opts: { timeoutMs: number },
  ) {
    this.repo = new TokenRepo(db);
  }

  withDb(db: DbExecutor): PgTokenStore {
    return new PgTokenStore(db, this.codec, this.opts);
  }

  async insert(credential: Credential, opts?: StoreCallOptions): Promise<void> {
    try {
      await runWithDeadline(() => this.repo.insertToken(credential), this.deadline(opts));
    } catch (err) {
      if (isUniqueViolation(err)) throw TokenErrors.hashCollision();
      throw err;
    }
  }

  async resolve(
    scope: TokenScope,
    plaintext: string,
    opts?: StoreCallOptions,
  ): Promise<TokenSubject> {
    const hash = this.codec.hash(plaintext);

    const row = await runWithDeadline(
      () => selectUserByTokenSql(this.db, { hash, scope }),
      this.deadline(opts),
    );
    if (!row) throw TokenErrors.notFound();

    return toUser(row);
  }

  async deleteAllForSubject(
    userId: UserId,
    scope: TokenScope,
    opts?: StoreCallOptions,
  ): Promise<void> {
    await runWithDeadline(() => this.repo.deleteAllForUser(userId, scope), this.deadline(opts));
  }

  private deadline(opts?: StoreCallOptions) {
    return { timeoutMs: this.opts.timeoutMs, signal: opts?.signal };
  }
}
