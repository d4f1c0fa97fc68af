/**
 * backend/src/modules/books/index.ts
 *
 * Public surface of the books module.
 */

export { createBookModule, type BookModule } from './book.module';
export { BookService, type BookCallContext, type ListBooksParams } from './book.service';
export { BookErrors } from './book.errors';
export { BOOK_SORT_COLUMNS, BOOK_SORT_SAFELIST, type BookSortColumn } from './book.constants';
export type { Book, BookPage, BookPatch, NewBook } from './book.types';
