/**
 * backend/src/modules/auth/flows/activate/execute-activate-flow.ts
 *
 * WHY:
 * - Consumes an activation token: marks the user activated, then removes
 *   every activation token the user holds.
 *
 * RULES:
 * - Any resolution miss is one validation error on `token`.
 * - The activated flag is written with the version read at resolution time;
 *   a concurrent change to the user is a 409, not an overwrite.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { runWithDeadline } from '../../../../shared/db/deadline';
import { isAppError } from '../../../../shared/http/errors';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';

import type { TokenModule } from '../../../tokens';
import { toPublicUser, toUser, type User, type UserRepo } from '../../../users';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { ActivateResult, AuthRequestMeta } from '../../auth.types';

export type ActivateParams = AuthRequestMeta & {
  token: string;
};

export async function executeActivateFlow(
  deps: {
    db: DbExecutor;
    logger: Logger;
    rateLimiter: RateLimiter;
    userRepo: UserRepo;
    tokens: TokenModule;
    storeTimeoutMs: number;
  },
  params: ActivateParams,
): Promise<ActivateResult> {
  deps.logger.info({
    msg: 'auth.activate.start',
    flow: 'auth.activate',
    requestId: params.requestId,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `activate:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.activate.perIp,
  });

  let user: User;
  try {
    user = await deps.tokens.store.resolve('activation', params.token, { signal: params.signal });
  } catch (err) {
    if (isAppError(err, 'NOT_FOUND')) throw AuthErrors.activationTokenInvalid();
    throw err;
  }

  const updated = await runWithDeadline(
    () =>
      deps.userRepo.updateUser({
        id: user.id,
        expectedVersion: user.version,
        patch: { activated: true },
      }),
    { timeoutMs: deps.storeTimeoutMs, signal: params.signal },
  );

  if (!updated) {
    deps.logger.warn({
      msg: 'auth.activate.conflict',
      flow: 'auth.activate',
      requestId: params.requestId,
      userId: user.id,
    });
    throw AuthErrors.editConflict({ userId: user.id });
  }

  await deps.tokens.store.deleteAllForSubject(user.id, 'activation', { signal: params.signal });

  deps.logger.info({
    msg: 'auth.activate.success',
    flow: 'auth.activate',
    requestId: params.requestId,
    userId: user.id,
  });

  return { user: toPublicUser(toUser(updated)) };
}
