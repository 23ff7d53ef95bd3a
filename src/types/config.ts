/**
 * Configuration type definitions for taskledger.
 * Covers the per-project config file with env overrides.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the ledger directory (default: 'logs/taskledger.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** SQLite storage configuration. */
export interface StorageConfig {
  /** Database file name inside the ledger directory. */
  fileName: string;
  busyTimeoutMs: number;
  /** Request WAL journaling for file databases. */
  wal: boolean;
}

/** Taskledger project configuration (config.json). */
export interface LedgerConfig {
  logging: LoggingConfig;
  storage: StorageConfig;
}
