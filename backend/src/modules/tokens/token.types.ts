/**
 * backend/src/modules/tokens/token.types.ts
 *
 * WHY:
 * - A Credential is what gets persisted: the lookup hash, never the raw token.
 * - Scope partitions the namespace so an activation token can never
 *   authenticate a request and vice versa.
 */

import type { User, UserId } from '../users';

export const TOKEN_SCOPES = ['activation', 'authentication'] as const;
export type TokenScope = (typeof TOKEN_SCOPES)[number];

export type Credential = Readonly<{
  /** sha256 hex of the raw token */
  hash: string;
  userId: UserId;
  scope: TokenScope;
  expiresAt: Date;
}>;

/**
 * Result of issuing a token. `plaintext` is handed to the client exactly once
 * and must not be logged or stored anywhere.
 */
export type IssuedToken = Readonly<{
  plaintext: string;
  credential: Credential;
}>;

/** The user a presented token resolves to. */
export type TokenSubject = User;
