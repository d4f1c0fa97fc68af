/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - Creates an inactive account and hands back its activation token.
 *
 * TRANSACTION (all or nothing):
 * 1) insert user (duplicate email -> validation error on `email`)
 * 2) grant default permissions
 * 3) issue + insert activation token (hash only)
 * 4) abort check: a deadline or client disconnect here rolls everything back
 *
 * RULES:
 * - Rate limit and bcrypt happen before the transaction (no tx held open
 *   during the slow hash).
 * - The plaintext token is returned once and never logged.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { runWithDeadline } from '../../../../shared/db/deadline';
import { isUniqueViolation } from '../../../../shared/db/pg-errors';
import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../../shared/security/token-hasher';

import type { PermissionRepo } from '../../../permissions';
import type { TokenModule } from '../../../tokens';
import { toPublicUser, toUser, type UserRepo } from '../../../users';

import { AUTH_RATE_LIMITS, REGISTER_DEFAULT_PERMISSIONS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { AuthRequestMeta, RegisterResult } from '../../auth.types';
import { emailDomain } from '../../helpers/email-domain';

export type RegisterParams = AuthRequestMeta & {
  name: string;
  email: string;
  password: string;
};

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    userRepo: UserRepo;
    permissionRepo: PermissionRepo;
    tokens: TokenModule;
    activationTtlMs: number;
    storeTimeoutMs: number;
  },
  params: RegisterParams,
): Promise<RegisterResult> {
  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.register.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.register.perIp,
  });

  const passwordHash = await deps.passwordHasher.hash(params.password);

  const { user, token } = await runWithDeadline(
    (signal) =>
      deps.db.transaction().execute(async (trx) => {
        const row = await deps.userRepo
          .withDb(trx)
          .insertUser({ name: params.name, email, passwordHash })
          .catch((err: unknown) => {
            if (isUniqueViolation(err)) throw AuthErrors.emailTaken();
            throw err;
          });

        await deps.permissionRepo.withDb(trx).grantToUser(row.id, REGISTER_DEFAULT_PERMISSIONS);

        const issued = await deps.tokens.newToken(
          { userId: row.id, ttlMs: deps.activationTtlMs, scope: 'activation' },
          { store: deps.tokens.forTransaction(trx), signal },
        );

        signal.throwIfAborted();

        return { user: toUser(row), token: issued.plaintext };
      }),
    { timeoutMs: deps.storeTimeoutMs, signal: params.signal },
  );

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    userId: user.id,
  });

  return { token, user: toPublicUser(user) };
}
