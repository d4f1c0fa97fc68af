/**
 * backend/src/shared/db/pg-errors.ts
 *
 * Structural checks on errors surfaced by the pg driver.
 * Matches on the SQLSTATE `code` so callers never depend on error identity.
 */

const UNIQUE_VIOLATION = '23505';
const QUERY_CANCELED = '57014';

type PgErrorLike = { code: string; constraint?: string };

function isPgErrorLike(err: unknown): err is PgErrorLike {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!isPgErrorLike(err) || err.code !== UNIQUE_VIOLATION) return false;
  return constraint === undefined || err.constraint === constraint;
}

/** Raised by Postgres when `statement_timeout` cancels a running statement. */
export function isQueryCanceled(err: unknown): boolean {
  return isPgErrorLike(err) && err.code === QUERY_CANCELED;
}
