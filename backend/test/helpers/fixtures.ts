import type { User } from '../../src/modules/users';
import type { BookRow } from '../../src/modules/books/dal/book.query-sql';
import type { UserRow } from '../../src/modules/users/dal/user.query-sql';

const FIXED_DATE = new Date('2024-01-02T03:04:05.000Z');

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 1,
    name: 'Ada Reader',
    email: 'ada@example.com',
    activated: true,
    version: 1,
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
    ...overrides,
  };
}

export function makeUserRow(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: 1,
    name: 'Ada Reader',
    email: 'ada@example.com',
    password_hash: 'not-a-real-hash',
    activated: false,
    version: 1,
    created_at: FIXED_DATE,
    updated_at: FIXED_DATE,
    ...overrides,
  };
}

export function makeBookRow(overrides: Partial<BookRow> = {}): BookRow {
  return {
    id: 1,
    title: 'The Left Hand of Darkness',
    author: 'Ursula K. Le Guin',
    published_year: 1969,
    version: 1,
    created_at: FIXED_DATE,
    updated_at: FIXED_DATE,
    ...overrides,
  };
}
