/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod rather than
 *   silently falling through to the wrong branch in di.ts.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('catalog-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Every storage call is bounded by this deadline (ms).
  STORE_TIMEOUT_MS: z.coerce.number().int().min(100).max(30_000).default(3_000),

  // Token lifetimes
  AUTH_TOKEN_TTL_HOURS: z.coerce
    .number()
    .int()
    .min(1)
    .max(24 * 30)
    .default(24),
  ACTIVATION_TOKEN_TTL_HOURS: z.coerce
    .number()
    .int()
    .min(1)
    .max(24 * 30)
    .default(72),

  // Listing endpoints
  PAGE_SIZE_MAX: z.coerce.number().int().min(1).max(1_000).default(100),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_ADMIN_PASSWORD: z.string().min(8).default('change-me-please'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  storeTimeoutMs: number;

  tokens: {
    authenticationTtlHours: number;
    activationTtlHours: number;
  };

  pagination: {
    maxPageSize: number;
  };

  seed: {
    enabled: boolean;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,

    tokens: {
      authenticationTtlHours: parsed.AUTH_TOKEN_TTL_HOURS,
      activationTtlHours: parsed.ACTIVATION_TOKEN_TTL_HOURS,
    },

    pagination: {
      maxPageSize: parsed.PAGE_SIZE_MAX,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
