/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Credential endpoints are brute-force targets:
 *   - login: 5 / 15min per email, 20 / 15min per IP
 *   - register: 5 / 15min per email, 20 / 15min per IP
 *   - activate: 10 / 15min per IP
 * - Counters live in Redis in prod; this class depends only on Cache.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check. Two concurrent hits both increment; whichever pushes the
 *   counter past the limit is rejected.
 *
 * DISABLING:
 * - `disabled: true` skips all checks (set by the composition root in tests).
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = Readonly<{ limit: number; windowSeconds: number }>;

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
