/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Ensures:
 * - an activated admin user (SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD)
 * - holding every permission code (books:read, books:write)
 *
 * Idempotent: safe to run on every start. An existing admin keeps its
 * password; only activation and grants are topped up.
 */

import type { DbExecutor } from '../db';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

import { PERMISSION_CODES, PermissionRepo } from '../../../modules/permissions';
import { getUserByEmail, UserRepo } from '../../../modules/users';

type DevSeedOptions = {
  adminEmail: string;
  adminPassword: string;
};

export async function runDevSeed(opts: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<{ userId: number; created: boolean }> {
  const { db, passwordHasher, options } = opts;
  const flow = 'seed.dev';

  const userRepo = new UserRepo(db);
  const permissionRepo = new PermissionRepo(db);

  return db.transaction().execute(async (trx) => {
    const users = userRepo.withDb(trx);
    const existing = await getUserByEmail(trx, options.adminEmail);

    let userId: number;
    let created = false;

    if (!existing) {
      const row = await users.insertUser({
        name: 'Admin',
        email: options.adminEmail,
        passwordHash: await passwordHasher.hash(options.adminPassword),
        activated: true,
      });
      userId = row.id;
      created = true;

      logger.info('seed.admin.created', { flow, userId });
    } else {
      userId = existing.id;

      if (!existing.activated) {
        await users.updateUser({
          id: existing.id,
          expectedVersion: existing.version,
          patch: { activated: true },
        });
        logger.info('seed.admin.activated', { flow, userId });
      }
    }

    await permissionRepo.withDb(trx).grantToUser(userId, PERMISSION_CODES);

    return { userId, created };
  });
}
