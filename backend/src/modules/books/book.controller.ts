/**
 * backend/src/modules/books/book.controller.ts
 *
 * WHY:
 * - Maps HTTP -> BookService.
 *
 * RULES:
 * - No DB access here.
 * - Guard order: activated user, then permission, then input.
 * - Validate with Zod and throw AppError.
 * - A malformed :id is a 404, the same as an unknown one.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { requireActivatedUser } from '../../shared/http/require-auth-context';
import { invalidRequest } from '../../shared/http/zod-fields';
import type { PermissionCode, PermissionService } from '../permissions';
import { BookErrors } from './book.errors';
import { BOOKS_BASE_PATH } from './book.constants';
import {
  bookIdParamsSchema,
  createBookSchema,
  expectedVersionSchema,
  listBooksQuerySchema,
  updateBookSchema,
} from './book.schemas';
import type { BookCallContext, BookService } from './book.service';

export class BookController {
  constructor(
    private readonly bookService: BookService,
    private readonly permissionService: PermissionService,
  ) {}

  private async authorize(req: FastifyRequest, code: PermissionCode): Promise<BookCallContext> {
    const user = requireActivatedUser(req);
    await this.permissionService.requirePermission(user, code, {
      signal: req.requestContext.signal,
    });
    return { requestId: req.requestContext.requestId, signal: req.requestContext.signal };
  }

  private parseId(req: FastifyRequest): number {
    const parsed = bookIdParamsSchema.safeParse(req.params);
    if (!parsed.success) throw BookErrors.notFound();
    return parsed.data.id;
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const ctx = await this.authorize(req, 'books:read');

    const parsed = listBooksQuerySchema.safeParse(req.query);
    if (!parsed.success) throw invalidRequest('Invalid query parameters', parsed.error.issues);

    const page = await this.bookService.listBooks(
      {
        title: parsed.data.title,
        author: parsed.data.author,
        filters: {
          page: parsed.data.page,
          pageSize: parsed.data.page_size,
          sort: parsed.data.sort,
        },
      },
      ctx,
    );

    return reply.status(200).send(page);
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const ctx = await this.authorize(req, 'books:read');
    const book = await this.bookService.getBook(this.parseId(req), ctx);
    return reply.status(200).send({ book });
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const ctx = await this.authorize(req, 'books:write');

    const parsed = createBookSchema.safeParse(req.body);
    if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);

    const book = await this.bookService.createBook(parsed.data, ctx);

    return reply
      .status(201)
      .header('Location', `${BOOKS_BASE_PATH}/${book.id}`)
      .send({ book });
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const ctx = await this.authorize(req, 'books:write');
    const id = this.parseId(req);

    const version = expectedVersionSchema.safeParse(req.headers['x-expected-version']);
    if (!version.success) {
      throw invalidRequest('Invalid X-Expected-Version header', version.error.issues);
    }

    const parsed = updateBookSchema.safeParse(req.body);
    if (!parsed.success) throw invalidRequest('Invalid request body', parsed.error.issues);

    const book = await this.bookService.updateBook(id, parsed.data, {
      ...ctx,
      expectedVersion: version.data,
    });

    return reply.status(200).send({ book });
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const ctx = await this.authorize(req, 'books:write');
    const book = await this.bookService.deleteBook(this.parseId(req), ctx);
    return reply.status(200).send({ message: 'book successfully deleted', book });
  }
}
