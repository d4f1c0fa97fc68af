/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them.
 * - Tests pass overrides (in-process db, InMemCache, InMemTokenStore).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule, type UserModule } from '../modules/users';
import { createTokenModule, HOUR_MS, type TokenModule, type TokenStore } from '../modules/tokens';
import { createPermissionModule, type PermissionModule } from '../modules/permissions';
import { createBookModule, type BookModule } from '../modules/books';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;
  tokens: TokenModule;
  permissions: PermissionModule;
  books: BookModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  cache?: Cache;
  tokenStore?: TokenStore;
  passwordHasher?: PasswordHasher;
};

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const db =
    overrides.db ??
    createDb({ databaseUrl: config.databaseUrl, statementTimeoutMs: config.storeTimeoutMs });

  // Redis is mandatory outside tests
  const redis = overrides.cache ? null : await RedisCache.connect(config.redisUrl);
  const cache: Cache = overrides.cache ?? redis ?? fail('cache');

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const storeTimeoutMs = config.storeTimeoutMs;

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });
  const tokens = createTokenModule({
    db,
    tokenHasher,
    storeTimeoutMs,
    tokenStore: overrides.tokenStore,
  });
  const permissions = createPermissionModule({ db, storeTimeoutMs });

  const books = createBookModule({
    db,
    logger,
    permissionService: permissions.permissionService,
    storeTimeoutMs,
    maxPageSize: config.pagination.maxPageSize,
  });

  const auth = createAuthModule({
    db,
    tokenHasher,
    passwordHasher,
    logger,
    rateLimiter,
    userRepo: users.userRepo,
    permissionRepo: permissions.permissionRepo,
    tokens,
    activationTtlMs: config.tokens.activationTtlHours * HOUR_MS,
    authenticationTtlMs: config.tokens.authenticationTtlHours * HOUR_MS,
    storeTimeoutMs,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    users,
    tokens,
    permissions,
    books,
    auth,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}

function fail(what: string): never {
  throw new Error(`di: no ${what} configured`);
}
