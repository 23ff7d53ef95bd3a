/**
 * Centralized pino logger factory for taskledger.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * All diagnostic logging goes to files or stderr; stdout is left to
 * whatever tool protocol embeds the ledger.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;
let currentLogDir: string | null = null;

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param ledgerDir - Absolute path to the project's ledger directory
 * @param config    - Logging section of the resolved LedgerConfig
 */
export function initLogger(ledgerDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(ledgerDir, config.filePath);
  currentLogDir = dirname(dest);
  mkdirSync(currentLogDir, { recursive: true });

  // pino.transport() runs in a worker thread
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/** Whether initLogger has run (and closeLogger has not). */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a child of a warn-level
 * stderr logger so library use and tests never crash. Long-lived objects
 * should call this per log statement rather than keep the result, so they
 * pick up a logger initialised after their construction.
 *
 * @param subsystem - Logical subsystem name (e.g. 'task-store', 'registry')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) return rootLogger.child({ subsystem });

  if (!fallbackLogger) {
    fallbackLogger = pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );
  }
  return fallbackLogger.child({ subsystem });
}

/** Directory the rotating log file lives in, or null before initLogger. */
export function getLogDir(): string | null {
  return currentLogDir;
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
  currentLogDir = null;
}
