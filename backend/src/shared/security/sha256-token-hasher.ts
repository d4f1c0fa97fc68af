/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * SHA-256 TokenHasher, hex encoded (64 chars). Tokens carry 128 bits of
 * randomness, so an unsalted fast digest is sufficient here; passwords use
 * BcryptPasswordHasher instead.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
