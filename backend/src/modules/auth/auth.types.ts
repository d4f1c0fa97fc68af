/**
 * src/modules/auth/auth.types.ts
 *
 * Response shapes of the auth flows. Raw tokens appear in exactly these
 * bodies, once, and nowhere else.
 */

import type { PublicUser } from '../users';

export type RegisterResult = {
  /** activation token, delivered once */
  token: string;
  user: PublicUser;
};

export type ActivateResult = {
  user: PublicUser;
};

export type LoginResult = {
  authentication_token: {
    token: string;
    /** ISO-8601 */
    expiry: string;
  };
};

/** Carried from controller into every flow. */
export type AuthRequestMeta = {
  ip: string;
  requestId: string;
  signal?: AbortSignal;
};
