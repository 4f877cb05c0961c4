/**
 * backend/src/shared/db/unique-violation.ts
 *
 * WHY:
 * - A check-then-insert cannot close the race between two concurrent writers.
 *   The unique constraint is the final word; flows translate its violation
 *   into their own domain error.
 *
 * RULES:
 * - Postgres: SQLSTATE 23505 on constraint `<table>_<column>_key`
 *   (the name Postgres gives an inline UNIQUE column).
 * - SQLite (tests): SQLITE_CONSTRAINT_UNIQUE naming `<table>.<column>`.
 * - Matches one column only; a violation elsewhere is not ours to translate.
 */

export type UniqueTarget = Readonly<{ table: string; column: string }>;

const PG_UNIQUE_VIOLATION = '23505';
const SQLITE_UNIQUE_VIOLATION = 'SQLITE_CONSTRAINT_UNIQUE';

export function isUniqueViolation(err: unknown, target: UniqueTarget): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if (!('code' in err) || typeof err.code !== 'string') return false;

  if (err.code === PG_UNIQUE_VIOLATION) {
    return 'constraint' in err && err.constraint === `${target.table}_${target.column}_key`;
  }

  if (err.code === SQLITE_UNIQUE_VIOLATION) {
    return err instanceof Error && err.message.includes(`${target.table}.${target.column}`);
  }

  return false;
}
