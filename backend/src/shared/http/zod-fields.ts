/**
 * backend/src/shared/http/zod-fields.ts
 *
 * WHY:
 * - Controllers validate with zod; clients get `fields: { <field>: <problem> }`.
 * - Full zod issues stay in meta (logs only).
 *
 * HOW TO USE:
 *   const parsed = schema.safeParse(req.body);
 *   if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);
 */

import type { ZodIssue } from 'zod';
import { AppError, type AppErrorFields } from './errors';

/** Issues without a path (e.g. unknown keys) are reported under this name. */
export const ROOT_FIELD = 'body';

export function issuesToFields(issues: readonly ZodIssue[]): AppErrorFields {
  const fields: AppErrorFields = {};

  for (const issue of issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;
    // first problem per field wins
    if (fields[field] === undefined) fields[field] = issue.message;
  }

  return fields;
}

export function invalidRequest(message: string, issues: readonly ZodIssue[]): AppError {
  return AppError.validationError(message, { issues }, issuesToFields(issues));
}
