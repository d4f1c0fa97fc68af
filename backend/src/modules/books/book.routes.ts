/**
 * backend/src/modules/books/book.routes.ts
 *
 * WHY:
 * - Declares Books module endpoints. Access rules live in the controller.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { BookController } from './book.controller';
import { BOOKS_BASE_PATH } from './book.constants';

export function registerBookRoutes(app: FastifyInstance, controller: BookController) {
  app.get(BOOKS_BASE_PATH, controller.list.bind(controller));
  app.post(BOOKS_BASE_PATH, controller.create.bind(controller));
  app.get(`${BOOKS_BASE_PATH}/:id`, controller.get.bind(controller));
  app.patch(`${BOOKS_BASE_PATH}/:id`, controller.update.bind(controller));
  app.delete(`${BOOKS_BASE_PATH}/:id`, controller.remove.bind(controller));
}
