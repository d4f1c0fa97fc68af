/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the whole service.
 * - Every line carries `service` and `env`; request handlers add more via
 *   withRequestContext(req).
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Pass `{ err }` rather than a bare Error so stack/message survive.
 *
 * SECRETS:
 * - Top-level fields named in SECRET_LOG_KEYS are masked on every line, so a
 *   token or password that slips into log meta never reaches the transport.
 */

import winston from 'winston';

export const SECRET_LOG_KEYS: ReadonlySet<string> = new Set([
  'token',
  'plaintext',
  'hash',
  'password',
  'passwordHash',
  'authorization',
]);

export const REDACTED = '[REDACTED]';

const redactSecrets = winston.format((info) => {
  for (const key of SECRET_LOG_KEYS) {
    if (key in info) info[key] = REDACTED;
  }
  return info;
});

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'catalog-backend';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service, env: nodeEnv },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
