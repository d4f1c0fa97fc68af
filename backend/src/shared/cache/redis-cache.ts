/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache, backing the rate limiter.
 *
 * IMPORTANT:
 * - The client type is derived from createClient() instead of importing
 *   RedisClientType, which avoids clashes between copies of @redis/client.
 *
 * LOGGING:
 * - Connection errors fire outside any request, so the global logger is used.
 */

import { createClient } from 'redis';
import type { Cache, IncrOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async incr(key: string, opts?: IncrOptions): Promise<number> {
    const value = await this.client.incr(key);

    if (opts?.ttlSeconds) {
      // -1: key exists without expiry (first hit in this window)
      const ttl = await this.client.ttl(key);
      if (ttl < 0) {
        await this.client.expire(key, opts.ttlSeconds);
      }
    }

    return value;
  }
}
