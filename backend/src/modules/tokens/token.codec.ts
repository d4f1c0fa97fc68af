/**
 * backend/src/modules/tokens/token.codec.ts
 *
 * WHY:
 * - One place that turns randomness into a transport-safe token and derives
 *   the deterministic lookup hash stored in `tokens.hash`.
 *
 * RULES:
 * - No persistence here; callers insert `credential` through a TokenStore.
 * - Tokens are base32 (A-Z, 2-7) without padding: 26 chars for 16 bytes.
 */

import * as OTPAuth from 'otpauth';

import type { TokenHasher } from '../../shared/security/token-hasher';
import { TOKEN_BYTES } from './token.constants';
import { TokenErrors } from './token.errors';
import type { IssuedToken, TokenScope } from './token.types';
import type { UserId } from '../users';

export type IssueTokenInput = {
  userId: UserId;
  ttlMs: number;
  scope: TokenScope;
};

export class TokenCodec {
  constructor(
    private readonly hasher: TokenHasher,
    private readonly now: () => Date = () => new Date(),
  ) {}

  issue(input: IssueTokenInput): IssuedToken {
    const plaintext = this.generate();

    return {
      plaintext,
      credential: {
        hash: this.hash(plaintext),
        userId: input.userId,
        scope: input.scope,
        expiresAt: new Date(this.now().getTime() + input.ttlMs),
      },
    };
  }

  hash(plaintext: string): string {
    return this.hasher.hash(plaintext);
  }

  private generate(): string {
    let encoded: string;
    try {
      // otpauth draws from the platform CSPRNG (crypto.getRandomValues)
      encoded = new OTPAuth.Secret({ size: TOKEN_BYTES }).base32;
    } catch (err) {
      throw TokenErrors.generationFailed({
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    return encoded.replace(/=+$/, '');
  }
}
