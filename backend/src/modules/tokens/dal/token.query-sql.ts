/**
 * backend/src/modules/tokens/dal/token.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for tokens.
 *
 * RULES:
 * - Expiry is compared against the DB clock (now()), not the app clock.
 * - No AppError.
 */

import { sql } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from '../../users/dal/user.query-sql';

export async function selectUserByTokenSql(
  db: DbExecutor,
  params: { hash: string; scope: string },
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .innerJoin('tokens', 'tokens.user_id', 'users.id')
    .selectAll('users')
    .where('tokens.hash', '=', params.hash)
    .where('tokens.scope', '=', params.scope)
    .where('tokens.expires_at', '>', sql<Date>`now()`)
    .executeTakeFirst();
}
