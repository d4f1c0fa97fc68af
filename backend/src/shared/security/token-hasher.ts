/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Bearer tokens (activation, authentication) are never stored raw.
 * - Only a deterministic digest is persisted, so a DB leak yields nothing usable
 *   and a presented token can still be found by recomputing the digest.
 *
 * HOW TO USE:
 * - issue: raw token -> hash -> store hash
 * - resolve: presented token -> hash -> look up by hash
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
