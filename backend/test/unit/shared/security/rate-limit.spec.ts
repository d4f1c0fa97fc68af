import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter.hitOrThrow', () => {
  it('allows up to the limit, then throws with the prefixed key', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const rule = { key: 'login:email:a@example.com', limit: 2, windowSeconds: 60 };

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);

    const err = await limiter.hitOrThrow(rule).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ key: 'rl:login:email:a@example.com', limit: 2, windowSeconds: 60 });
  });

  it('keeps separate counters per key', async () => {
    const limiter = new RateLimiter(new InMemCache());

    await limiter.hitOrThrow({ key: 'a', limit: 1, windowSeconds: 60 });
    await expect(limiter.hitOrThrow({ key: 'b', limit: 1, windowSeconds: 60 })).resolves.toBeUndefined();
    await expect(limiter.hitOrThrow({ key: 'a', limit: 1, windowSeconds: 60 })).rejects.toBeInstanceOf(
      RateLimitError,
    );
  });

  it('does nothing when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });
    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow({ key: 'x', limit: 1, windowSeconds: 60 });
    }
  });
});
