/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate-limit counters are short-lived and must be shared by every instance.
 * - Services depend on this abstraction; tests use InMemCache.
 *
 * HOW TO USE:
 * - const n = await cache.incr('rl:login:ip:1.2.3.4', { ttlSeconds: 900 })
 */

export type IncrOptions = {
  /** Applied only when the counter has no expiry yet (fixed window). */
  ttlSeconds?: number;
};

export interface Cache {
  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: IncrOptions): Promise<number>;
}
