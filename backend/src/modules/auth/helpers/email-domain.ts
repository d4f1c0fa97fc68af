/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * Domain part of an email for PII-minimized logging ("" when there is no @).
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
