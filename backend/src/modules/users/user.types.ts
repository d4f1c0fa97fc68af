/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are the subjects that own tokens and permission grants.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - passwordHash never leaves the module boundary in a response.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string;
  email: string;
  activated: boolean;
  /** Bumped on every write; backs optimistic conflict detection. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type UserWithPassword = User & { passwordHash: string };

/** Response shape. */
export type PublicUser = {
  id: UserId;
  name: string;
  email: string;
  activated: boolean;
  createdAt: string;
};
