/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new user. Email uniqueness is enforced by the `users_email_key`
   * constraint; callers map the unique violation.
   */
  async insertUser(params: {
    name: string;
    email: string;
    passwordHash: string;
    activated?: boolean;
  }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        name: params.name,
        email: params.email.toLowerCase(),
        password_hash: params.passwordHash,
        activated: params.activated ?? false,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Optimistic update: applies only while the stored version still equals
   * `expectedVersion`. Returns undefined when another writer got there first
   * (or the row is gone).
   */
  async updateUser(params: {
    id: number;
    expectedVersion: number;
    patch: { name?: string; email?: string; passwordHash?: string; activated?: boolean };
  }): Promise<UserRow | undefined> {
    const { patch } = params;

    return this.db
      .updateTable('users')
      .set((eb) => ({
        ...(patch.name !== undefined ? { name: patch.name } : {}),
        ...(patch.email !== undefined ? { email: patch.email.toLowerCase() } : {}),
        ...(patch.passwordHash !== undefined ? { password_hash: patch.passwordHash } : {}),
        ...(patch.activated !== undefined ? { activated: patch.activated } : {}),
        version: eb('version', '+', 1),
        updated_at: new Date(),
      }))
      .where('id', '=', params.id)
      .where('version', '=', params.expectedVersion)
      .returningAll()
      .executeTakeFirst();
  }
}
