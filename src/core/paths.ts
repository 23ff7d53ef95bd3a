/**
 * Path resolution for a project's ledger data.
 *
 * Environment variables:
 *   TASKLEDGER_DIR - Ledger data directory, relative to the project or absolute (default: .taskledger)
 */

import { isAbsolute, join, resolve } from 'node:path';

/** Default ledger directory name inside a project. */
export const DEFAULT_LEDGER_DIR = '.taskledger';

/** Default database file name inside the ledger directory. */
export const DEFAULT_DB_FILENAME = 'taskledger.sqlite';

/** Config file name inside the ledger directory. */
export const CONFIG_FILENAME = 'config.json';

/**
 * Get the ledger directory name (relative or absolute).
 * Respects TASKLEDGER_DIR.
 */
export function getLedgerDirName(): string {
  return process.env['TASKLEDGER_DIR'] ?? DEFAULT_LEDGER_DIR;
}

/** Get the absolute path of a project's ledger directory. */
export function getLedgerDir(projectDir: string): string {
  const dir = getLedgerDirName();
  return isAbsolute(dir) ? dir : resolve(projectDir, dir);
}

/** Get the path of a project's config file. */
export function getConfigPath(projectDir: string): string {
  return join(getLedgerDir(projectDir), CONFIG_FILENAME);
}

/** Get the path of a project's SQLite database. */
export function getDbPath(projectDir: string, fileName: string = DEFAULT_DB_FILENAME): string {
  return join(getLedgerDir(projectDir), fileName);
}
