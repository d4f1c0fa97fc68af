/**
 * backend/src/modules/tokens/index.ts
 *
 * Public surface of the tokens module.
 */

export { TokenCodec, type IssueTokenInput } from './token.codec';
export { TokenErrors } from './token.errors';
export { PgTokenStore } from './pg-token-store';
export { InMemTokenStore } from './inmem-token-store';
export { createTokenModule, type TokenModule } from './token.module';
export { TOKEN_LENGTH, TOKEN_PATTERN, HOUR_MS } from './token.constants';
export type { StoreCallOptions, TokenStore } from './token.store';
export {
  TOKEN_SCOPES,
  type Credential,
  type IssuedToken,
  type TokenScope,
  type TokenSubject,
} from './token.types';
