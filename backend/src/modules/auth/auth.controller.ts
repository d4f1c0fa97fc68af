/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP -> AuthService for register, activate and login.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { invalidRequest } from '../../shared/http/zod-fields';
import { activateSchema, loginSchema, registerSchema } from './auth.schemas';
import type { AuthRequestMeta } from './auth.types';
import type { AuthService } from './auth.service';

function requestMeta(req: FastifyRequest): AuthRequestMeta {
  return {
    ip: req.ip,
    requestId: req.requestContext.requestId,
    signal: req.requestContext.signal,
  };
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);

    const result = await this.authService.register({ ...parsed.data, ...requestMeta(req) });

    return reply.status(201).send({ user: result });
  }

  async activate(req: FastifyRequest, reply: FastifyReply) {
    const parsed = activateSchema.safeParse(req.body);
    if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);

    const result = await this.authService.activate({
      token: parsed.data.token,
      ...requestMeta(req),
    });

    return reply.status(200).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);

    const result = await this.authService.login({ ...parsed.data, ...requestMeta(req) });

    return reply.status(201).send(result);
  }
}
