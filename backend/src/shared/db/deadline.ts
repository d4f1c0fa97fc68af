/**
 * backend/src/shared/db/deadline.ts
 *
 * WHY:
 * - Every store operation must finish within a bounded time, or be abandoned
 *   and reported as a server fault. Callers never block indefinitely.
 * - If the inbound request goes away, in-flight work is cancelled too.
 *
 * HOW TO USE:
 *   await runWithDeadline((signal) => db.transaction().execute(async (trx) => {
 *     ...writes...
 *     signal.throwIfAborted(); // last step: a late deadline rolls the tx back
 *   }), { timeoutMs, signal: req.requestContext.signal });
 *
 * RULES:
 * - The signal handed to `op` aborts on deadline OR on parent abort; its
 *   `reason` is the AppError the caller will receive.
 * - Postgres `statement_timeout` cancellations (57014) surface as the same
 *   timeout error as the client-side deadline.
 */

import type { AppError } from '../http/errors';
import { isQueryCanceled } from './pg-errors';
import { StoreErrors } from './store.errors';

export type DeadlineOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export function runWithDeadline<T>(
  op: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions,
): Promise<T> {
  const parent = opts.signal;
  if (parent?.aborted) return Promise.reject(StoreErrors.aborted());

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const fail = (err: AppError) => {
      controller.abort(err);
      cleanup();
      reject(err);
    };

    const onParentAbort = () => fail(StoreErrors.aborted());

    const timer = setTimeout(
      () => fail(StoreErrors.timeout({ timeoutMs: opts.timeoutMs })),
      opts.timeoutMs,
    );

    function cleanup() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }

    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = op(controller.signal);
    } catch (err) {
      cleanup();
      reject(err);
      return;
    }

    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(isQueryCanceled(err) ? StoreErrors.timeout({ timeoutMs: opts.timeoutMs }) : err);
      },
    );
  });
}
