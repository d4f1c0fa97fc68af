/**
 * backend/src/modules/users/index.ts
 *
 * Public surface of the users module. Other modules import from here,
 * never from /dal or /queries directly.
 */

export { getUserByEmail, toPublicUser, toUser } from './queries/user.queries';
export { UserRepo } from './dal/user.repo';
export { createUserModule, type UserModule } from './user.module';
export type { User, UserId, PublicUser, UserWithPassword } from './user.types';
