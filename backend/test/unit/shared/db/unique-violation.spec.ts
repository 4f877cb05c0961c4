import { describe, it, expect } from 'vitest';
import { isUniqueViolation } from '../../../../src/shared/db/unique-violation';

const USERS_EMAIL = { table: 'users', column: 'email' };

function dbError(message: string, fields: Record<string, string>): Error {
  return Object.assign(new Error(message), fields);
}

describe('isUniqueViolation', () => {
  it('matches the Postgres violation on the target constraint', () => {
    const err = dbError('duplicate key value violates unique constraint', {
      code: '23505',
      constraint: 'users_email_key',
    });

    expect(isUniqueViolation(err, USERS_EMAIL)).toBe(true);
  });

  it('ignores a Postgres violation on another constraint', () => {
    const err = dbError('duplicate key value violates unique constraint', {
      code: '23505',
      constraint: 'users_name_key',
    });

    expect(isUniqueViolation(err, USERS_EMAIL)).toBe(false);
  });

  it('matches the SQLite violation naming the target column', () => {
    const email = dbError('UNIQUE constraint failed: users.email', {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });
    const name = dbError('UNIQUE constraint failed: users.name', {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });

    expect(isUniqueViolation(email, USERS_EMAIL)).toBe(true);
    expect(isUniqueViolation(name, USERS_EMAIL)).toBe(false);
  });

  it('is false for anything else', () => {
    expect(isUniqueViolation(new Error('boom'), USERS_EMAIL)).toBe(false);
    expect(isUniqueViolation(dbError('fk', { code: '23503' }), USERS_EMAIL)).toBe(false);
    expect(isUniqueViolation('23505', USERS_EMAIL)).toBe(false);
    expect(isUniqueViolation(null, USERS_EMAIL)).toBe(false);
  });
});
