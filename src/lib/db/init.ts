import Database from 'better-sqlite3';
import { createLogger } from '@/lib/utils/logger';
import { SCHEMA_STATEMENTS, SCHEMA_VERSION, VALIDATION_TRIGGERS } from './schema';

export type SQLiteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

const log = createLogger('SQLite');

export function openDatabase(filename: string = IN_MEMORY): SQLiteDatabase {
  const startTime = performance.now();
  const db = new Database(filename);

  if (filename !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  const elapsed = (performance.now() - startTime).toFixed(2);
  log.info(`Database ${filename} ready in ${elapsed}ms`);

  return db;
}

function runMigrations(db: SQLiteDatabase): void {
  const currentVersion = getSchemaVersion(db);
  log.debug(`Current schema version: ${currentVersion}, target: ${SCHEMA_VERSION}`);

  db.transaction(() => {
    for (const stmt of SCHEMA_STATEMENTS) {
      db.exec(stmt);
    }
    for (const stmt of VALIDATION_TRIGGERS) {
      db.exec(stmt);
    }
    if (currentVersion < SCHEMA_VERSION) {
      setSchemaVersion(db, SCHEMA_VERSION);
      log.info(`Schema upgraded to version ${SCHEMA_VERSION}`);
    }
  })();
}

export function getSchemaVersion(db: SQLiteDatabase): number {
  const table = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'metadata'")
    .get();
  if (!table) return 0;

  const row = db
    .prepare<[], { value: string }>("SELECT value FROM metadata WHERE key = 'schema_version'")
    .get();
  return row ? parseInt(row.value, 10) : 0;
}

function setSchemaVersion(db: SQLiteDatabase, version: number): void {
  db.prepare<[string, number]>(
    "INSERT OR REPLACE INTO metadata (key, value, updated_at) VALUES ('schema_version', ?, ?)"
  ).run(version.toString(), Date.now());
}
