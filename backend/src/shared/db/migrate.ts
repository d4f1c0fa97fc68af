/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations (src/shared/db/migrations) up to latest.
 * - Run with `tsx`, so the .ts migration files import directly.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import path from 'node:path';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { FileMigrationProvider, Migrator } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationFolder = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({
    databaseUrl: config.databaseUrl,
    // DDL (GIN index builds) may exceed the request-path deadline.
    statementTimeoutMs: 0,
  });

  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({ fs, path, migrationFolder }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('Migration failed', { err: error });
    process.exitCode = 1;
    return;
  }

  logger.info('Migrations up to date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exitCode = 1;
});
