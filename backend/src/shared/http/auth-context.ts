/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Single choke point that turns `Authorization: Bearer <token>` into a user.
 * - Every protected route reads req.authContext; none parse headers itself.
 *
 * HOW IT WORKS:
 * 1. No Authorization header -> anonymous (user: null). Guards decide later.
 * 2. Header present but not `Bearer <26-char base32>` -> 401.
 * 3. Token resolved with scope "authentication". Any miss (unknown, expired,
 *    activation-scoped) -> the same 401. Nothing in the response tells them apart.
 *
 * RULES:
 * - Responses vary on Authorization (set on every request).
 * - Storage failures are not auth failures: they propagate as server errors.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { isAppError } from './errors';
import { AuthContextErrors } from './auth-context.errors';
import { TOKEN_PATTERN, type TokenStore } from '../../modules/tokens';
import type { User } from '../../modules/users';

export type AuthContext = {
  user: User | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_PREFIX = 'Bearer ';

export type BearerParseResult =
  | { kind: 'missing' }
  | { kind: 'malformed' }
  | { kind: 'token'; token: string };

export function parseBearer(header: string | undefined): BearerParseResult {
  if (header === undefined || header === '') return { kind: 'missing' };

  if (!header.startsWith(BEARER_PREFIX)) return { kind: 'malformed' };

  const token = header.slice(BEARER_PREFIX.length);
  if (!TOKEN_PATTERN.test(token)) return { kind: 'malformed' };

  return { kind: 'token', token };
}

export async function authenticate(req: FastifyRequest, tokenStore: TokenStore): Promise<User | null> {
  const parsed = parseBearer(req.headers.authorization);

  if (parsed.kind === 'missing') return null;
  if (parsed.kind === 'malformed') throw AuthContextErrors.invalidToken();

  try {
    return await tokenStore.resolve('authentication', parsed.token, {
      signal: req.requestContext?.signal,
    });
  } catch (err) {
    if (isAppError(err, 'NOT_FOUND')) throw AuthContextErrors.invalidToken();
    throw err;
  }
}

export function registerAuthContext(app: FastifyInstance, deps: { tokenStore: TokenStore }) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    req.authContext = { user: null };
    reply.header('Vary', 'Authorization');

    req.authContext = { user: await authenticate(req, deps.tokenStore) };
  });
}
