import type { SQLiteDatabase } from './init';

/**
 * Runs `fn` inside a BEGIN IMMEDIATE transaction. The write lock is taken up
 * front, so two writers never interleave their read-check-write steps; any
 * throw rolls the whole unit back.
 */
export function runImmediate<T>(db: SQLiteDatabase, fn: () => T): T {
  return db.transaction(fn).immediate();
}
