/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Registration and login depend on this interface, not on bcrypt directly.
 * - Tests can inject a fast fake.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
