/**
 * backend/src/modules/books/book.module.ts
 *
 * WHY:
 * - Encapsulates Books module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PermissionService } from '../permissions';

import { BookController } from './book.controller';
import { BookService } from './book.service';
import { registerBookRoutes } from './book.routes';
import { BookRepo } from './dal/book.repo';

export type BookModule = ReturnType<typeof createBookModule>;

export function createBookModule(deps: {
  db: DbExecutor;
  logger: Logger;
  permissionService: PermissionService;
  storeTimeoutMs: number;
  maxPageSize: number;
}) {
  const bookRepo = new BookRepo(deps.db);

  const bookService = new BookService({
    db: deps.db,
    logger: deps.logger,
    bookRepo,
    storeTimeoutMs: deps.storeTimeoutMs,
    maxPageSize: deps.maxPageSize,
  });

  const controller = new BookController(bookService, deps.permissionService);

  return {
    bookService,
    registerRoutes(app: FastifyInstance) {
      registerBookRoutes(app, controller);
    },
  };
}
