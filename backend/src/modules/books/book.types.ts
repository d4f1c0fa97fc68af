/**
 * backend/src/modules/books/book.types.ts
 *
 * RULES:
 * - camelCase domain shape; snake_case stays in DAL.
 */

import type { Metadata } from '../../shared/query/pagination';

export type BookId = number;

export type Book = {
  id: BookId;
  title: string;
  author: string;
  publishedYear: number;
  /** Bumped on every update; compared on write for optimistic concurrency. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type BookPatch = Partial<Pick<Book, 'title' | 'author' | 'publishedYear'>>;

export type NewBook = Pick<Book, 'title' | 'author' | 'publishedYear'>;

export type BookPage = {
  books: Book[];
  metadata: Metadata;
};
