/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for register, activate and login.
 * - Each use-case lives in flows/<name>; the service only wires deps in.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of each flow (before any DB work).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { TokenHasher } from '../../shared/security/token-hasher';

import type { PermissionRepo } from '../permissions';
import type { TokenModule } from '../tokens';
import type { UserRepo } from '../users';

import type { ActivateResult, LoginResult, RegisterResult } from './auth.types';
import { executeActivateFlow, type ActivateParams } from './flows/activate/execute-activate-flow';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';

export type AuthServiceDeps = {
  db: DbExecutor;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  userRepo: UserRepo;
  permissionRepo: PermissionRepo;
  tokens: TokenModule;
  activationTtlMs: number;
  authenticationTtlMs: number;
  storeTimeoutMs: number;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(params: RegisterParams): Promise<RegisterResult> {
    return executeRegisterFlow(this.deps, params);
  }

  async activate(params: ActivateParams): Promise<ActivateResult> {
    return executeActivateFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<LoginResult> {
    return executeLoginFlow(this.deps, params);
  }
}
