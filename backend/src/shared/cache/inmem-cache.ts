/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and local dev without Redis) run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => fakeNowMs)   // tests controlling time
 */

import type { Cache, IncrOptions } from './cache';

type CounterEntry = { value: number; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly counters = new Map<string, CounterEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): CounterEntry | null {
    const entry = this.counters.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.counters.delete(key);
      return null;
    }
    return entry;
  }

  incr(key: string, opts?: IncrOptions): Promise<number> {
    const entry = this.live(key);
    const value = (entry?.value ?? 0) + 1;

    // Same as Redis INCR + EXPIRE-if-no-ttl: the window starts at the first hit.
    const expiresAtMs =
      entry?.expiresAtMs ?? (opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null);

    this.counters.set(key, { value, expiresAtMs });
    return Promise.resolve(value);
  }
}
