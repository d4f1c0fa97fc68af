import { describe, it, expect } from 'vitest';
import { runDevSeed } from '../../../../src/shared/db/seed/dev-seed';
import { BcryptPasswordHasher } from '../../../../src/shared/security/bcrypt-password-hasher';
import { TEST_BCRYPT_COST } from '../../../helpers/build-test-app';
import { createFakeDb, type RecordedQuery } from '../../../helpers/fake-db';
import { makeUserRow } from '../../../helpers/fixtures';

const options = { adminEmail: 'admin@example.com', adminPassword: 'test-password' };
const passwordHasher = new BcryptPasswordHasher({ cost: TEST_BCRYPT_COST });

function statements(queries: RecordedQuery[]): string[] {
  return queries.map((q) => q.sql.split(' (')[0] ?? q.sql);
}

describe('runDevSeed', () => {
  it('creates an activated admin holding every permission', async () => {
    const fake = createFakeDb((q) => {
      if (q.sql.startsWith('insert into "users" ')) {
        return { rows: [makeUserRow({ id: 1, email: 'admin@example.com', activated: true })] };
      }
      if (q.sql.startsWith('select "id" from "permissions"')) return { rows: [{ id: 1 }, { id: 2 }] };
      return { rows: [] };
    });

    await expect(runDevSeed({ db: fake.db, passwordHasher, options })).resolves.toEqual({
      userId: 1,
      created: true,
    });

    expect(fake.events).toEqual(['begin', 'commit']);
    expect(statements(fake.queries)).toEqual([
      'select * from "users" where "email" = $1',
      'insert into "users"',
      'select "id" from "permissions" where "code" in',
      'insert into "users_permissions"',
    ]);
    expect(fake.queries[1]?.parameters[3]).toBe(true);
    expect(fake.queries[2]?.parameters).toEqual(['books:read', 'books:write']);
    expect(fake.queries[3]?.parameters).toEqual([1, 1, 1, 2]);
  });

  it('activates an existing admin instead of inserting', async () => {
    const fake = createFakeDb((q) => {
      if (q.sql.startsWith('select * from "users"')) {
        return { rows: [makeUserRow({ id: 9, email: 'admin@example.com', activated: false, version: 2 })] };
      }
      if (q.sql.startsWith('update "users"')) return { rows: [makeUserRow({ id: 9, activated: true, version: 3 })] };
      return { rows: [] };
    });

    await expect(runDevSeed({ db: fake.db, passwordHasher, options })).resolves.toEqual({
      userId: 9,
      created: false,
    });

    expect(statements(fake.queries)).toEqual([
      'select * from "users" where "email" = $1',
      'update "users" set "activated" = $1, "version" = "version" + $2, "updated_at" = $3 where "id" = $4 and "version" = $5 returning *',
      'select "id" from "permissions" where "code" in',
    ]);
  });
});
