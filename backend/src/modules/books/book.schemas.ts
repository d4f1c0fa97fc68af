/**
 * backend/src/modules/books/book.schemas.ts
 *
 * WHY:
 * - Request validation for the Books module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Text limits are in bytes (UTF-8), not characters.
 * - Range checks for page/page_size/sort live in shared/query so every
 *   listing endpoint reports them the same way.
 */

import { z } from 'zod';
import { BOOK_LIST_DEFAULTS, BOOK_TEXT_MAX_BYTES } from './book.constants';

const INTEGER_MESSAGE = 'must be an integer value';

function intParam(defaultValue: number) {
  return z.coerce
    .number({ invalid_type_error: INTEGER_MESSAGE })
    .int(INTEGER_MESSAGE)
    .default(defaultValue);
}

function byteLength(value: string): number {
  return Buffer.byteLength(value, 'utf8');
}

const bookText = z
  .string()
  .trim()
  .min(1, 'must be provided')
  .refine((v) => byteLength(v) <= BOOK_TEXT_MAX_BYTES, {
    message: `must not be more than ${BOOK_TEXT_MAX_BYTES} bytes long`,
  });

const publishedYear = z
  .number({ invalid_type_error: INTEGER_MESSAGE })
  .int(INTEGER_MESSAGE)
  .positive('must be a positive integer')
  .refine((y) => y <= new Date().getUTCFullYear(), { message: 'must not be in the future' });

export const listBooksQuerySchema = z.object({
  title: z.string().trim().default(''),
  author: z.string().trim().default(''),
  page: intParam(BOOK_LIST_DEFAULTS.page),
  page_size: intParam(BOOK_LIST_DEFAULTS.pageSize),
  sort: z.string().default(BOOK_LIST_DEFAULTS.sort),
});

export const bookIdParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER),
});

export const createBookSchema = z
  .object({
    title: bookText,
    author: bookText,
    publishedYear,
  })
  .strict();

export const updateBookSchema = z
  .object({
    title: bookText.optional(),
    author: bookText.optional(),
    publishedYear: publishedYear.optional(),
  })
  .strict();

/** Optional `X-Expected-Version` header on PATCH. */
export const expectedVersionSchema = z.coerce
  .number({ invalid_type_error: INTEGER_MESSAGE })
  .int(INTEGER_MESSAGE)
  .positive('must be a positive integer')
  .optional();

export type ListBooksQuery = z.infer<typeof listBooksQuerySchema>;
export type CreateBookInput = z.infer<typeof createBookSchema>;
export type UpdateBookInput = z.infer<typeof updateBookSchema>;
