/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * bcrypt behind PasswordHasher. Cost comes from BCRYPT_COST (config).
 * bcrypt only reads the first 72 bytes; the register schema caps passwords there.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export const BCRYPT_DEFAULT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? BCRYPT_DEFAULT_COST;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
