/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - Exchanges email + password for an authentication-scoped bearer token.
 *
 * RULES:
 * - Unknown email and wrong password are the same 401.
 * - No HTTP concerns here (controller handles that).
 * - Raw email never goes into rate-limit keys or logs (hash / domain only).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { runWithDeadline } from '../../../../shared/db/deadline';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import type { TokenModule } from '../../../tokens';
import { getUserByEmail } from '../../../users';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { AuthRequestMeta, LoginResult } from '../../auth.types';
import { emailDomain } from '../../helpers/email-domain';

export type LoginParams = AuthRequestMeta & {
  email: string;
  password: string;
};

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    tokens: TokenModule;
    authenticationTtlMs: number;
    storeTimeoutMs: number;
  },
  params: LoginParams,
): Promise<LoginResult> {
  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const user = await runWithDeadline(() => getUserByEmail(deps.db, email), {
    timeoutMs: deps.storeTimeoutMs,
    signal: params.signal,
  });

  const passwordValid = user
    ? await deps.passwordHasher.verify(params.password, user.passwordHash)
    : false;

  if (!user || !passwordValid) {
    deps.logger.warn({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey,
      reason: user ? 'wrong_password' : 'user_not_found',
    });
    throw AuthErrors.invalidCredentials();
  }

  const issued = await deps.tokens.newToken(
    { userId: user.id, ttlMs: deps.authenticationTtlMs, scope: 'authentication' },
    { signal: params.signal },
  );

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    userId: user.id,
  });

  return {
    authentication_token: {
      token: issued.plaintext,
      expiry: issued.expiresAt.toISOString(),
    },
  };
}
