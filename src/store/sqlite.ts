/**
 * SQLite store via drizzle-orm/better-sqlite3.
 *
 * better-sqlite3 provides a synchronous file-backed SQLite engine; drizzle
 * wraps it with typed queries. Every repository call runs to completion
 * before returning, so a caller can group several calls in one
 * `nativeDb.transaction()`.
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { getLogger } from '../core/logger.js';
import { LedgerError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Schema version for newly created databases. Single source of truth. */
export const SQLITE_SCHEMA_VERSION = '1.0.0';

/** Typed drizzle handle over the ledger schema. */
export type LedgerDb = BetterSQLite3Database<typeof schema>;

/** An open database: the drizzle wrapper plus the native connection under it. */
export interface DatabaseHandle {
  db: LedgerDb;
  nativeDb: Database.Database;
  path: string;
}

export interface OpenDatabaseOptions {
  readonly?: boolean;
  busyTimeoutMs?: number;
  /** Request WAL journaling (ignored for in-memory databases). */
  wal?: boolean;
}

/**
 * Table and index DDL. Kept in sync with ./schema.ts by hand; every
 * statement is idempotent so it runs on each open.
 */
const SCHEMA_DDL = `
  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name VARCHAR(256) NOT NULL,
    description TEXT DEFAULT '',
    status VARCHAR(64) DEFAULT 'created',
    version INTEGER DEFAULT 1,
    number VARCHAR(256) NOT NULL,
    is_leaf BOOLEAN DEFAULT FALSE,
    parent_id INTEGER NOT NULL DEFAULT 0,
    root_id INTEGER NOT NULL DEFAULT 0,
    created_time DATETIME NOT NULL,
    updated_time DATETIME,
    started_time DATETIME,
    finished_time DATETIME,
    planned_start_time DATETIME,
    planned_finish_time DATETIME,
    progress REAL NOT NULL DEFAULT 0.0,
    deleted BOOLEAN NOT NULL DEFAULT FALSE
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_parent_id ON tasks(parent_id, deleted);
  CREATE INDEX IF NOT EXISTS idx_tasks_root_id_number ON tasks(root_id, number, deleted);
  CREATE INDEX IF NOT EXISTS idx_tasks_deleted ON tasks(deleted);
  CREATE INDEX IF NOT EXISTS idx_tasks_updated_time ON tasks(updated_time);
  CREATE TABLE IF NOT EXISTS schema_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

/**
 * Check whether a table exists in the SQLite database.
 */
export function tableExists(nativeDb: Database.Database, tableName: string): boolean {
  const row: unknown = nativeDb
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name=?")
    .get(tableName);
  return row !== undefined;
}

/**
 * Create tables and indexes if they don't exist, then seed the schema version.
 */
export function ensureSchema(nativeDb: Database.Database): void {
  const bootstrap = nativeDb.transaction(() => {
    nativeDb.exec(SCHEMA_DDL);
    nativeDb
      .prepare('INSERT OR IGNORE INTO schema_meta (key, value) VALUES (?, ?)')
      .run('schemaVersion', SQLITE_SCHEMA_VERSION);
  });
  bootstrap();
}

/**
 * Open a SQLite database with the ledger's standard pragmas and schema.
 * Pass ':memory:' for an ephemeral database.
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): DatabaseHandle {
  const log = getLogger('sqlite');
  const inMemory = path === ':memory:';

  let nativeDb: Database.Database;
  try {
    nativeDb = new Database(path, {
      readonly: options.readonly ?? false,
      timeout: options.busyTimeoutMs ?? 5000,
    });
  } catch (err) {
    throw new LedgerError(ExitCode.FILE_ERROR, `Cannot open database: ${path}`, { cause: err });
  }

  nativeDb.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

  if (!inMemory && options.wal !== false && !options.readonly) {
    nativeDb.pragma('journal_mode = WAL');
    // The pragma reports the mode actually applied; another connection holding
    // an exclusive lock leaves the database in its previous mode.
    const mode: unknown = nativeDb.pragma('journal_mode', { simple: true });
    if (typeof mode !== 'string' || mode.toLowerCase() !== 'wal') {
      log.warn({ path, mode }, 'WAL journal mode was not applied');
    }
  }

  if (!options.readonly) {
    ensureSchema(nativeDb);
  }

  const db = drizzle(nativeDb, { schema });
  log.debug({ path }, 'Database opened');
  return { db, nativeDb, path };
}

/**
 * Close the database connection and release resources.
 */
export function closeDatabase(handle: DatabaseHandle): void {
  if (handle.nativeDb.open) {
    handle.nativeDb.close();
  }
}

export { schema };
