/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./database.types (kept in sync with migrations).
 *
 * TIMEOUTS:
 * - `statement_timeout` makes Postgres cancel a statement server-side once the
 *   store deadline elapses; `query_timeout` is the client-side twin.
 * - Services additionally wrap calls in runWithDeadline() (./deadline).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './database.types';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions (pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

// bigserial ids and count(*) come back as int8; our ids stay well inside 2^53.
const INT8_OID = 20;
pg.types.setTypeParser(INT8_OID, (value: string) => Number.parseInt(value, 10));

export function createDb(opts: { databaseUrl: string; statementTimeoutMs: number }): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    statement_timeout: opts.statementTimeoutMs,
    query_timeout: opts.statementTimeoutMs,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
