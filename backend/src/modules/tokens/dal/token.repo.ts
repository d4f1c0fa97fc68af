/**
 * backend/src/modules/tokens/dal/token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for tokens.
 *
 * RULES:
 * - Only hashes reach this layer.
 * - No transactions started here; supports withDb() for tx binding.
 * - No AppError (unique violations bubble up raw).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Credential, TokenScope } from '../token.types';

export class TokenRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): TokenRepo {
    return new TokenRepo(db);
  }

  async insertToken(credential: Credential): Promise<void> {
    await this.db
      .insertInto('tokens')
      .values({
        hash: credential.hash,
        user_id: credential.userId,
        expires_at: credential.expiresAt,
        scope: credential.scope,
      })
      .execute();
  }

  /** Returns how many rows went away (0 is fine). */
  async deleteAllForUser(userId: number, scope: TokenScope): Promise<number> {
    const res = await this.db
      .deleteFrom('tokens')
      .where('user_id', '=', userId)
      .where('scope', '=', scope)
      .executeTakeFirst();

    return Number(res.numDeletedRows);
  }
}
