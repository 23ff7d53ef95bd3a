/**
 * Taskledger error type with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/**
 * Structured error class for ledger operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class LedgerError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'LedgerError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Whether the caller may re-read and retry. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for tool responses. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Narrow an unknown error to a LedgerError, optionally with a given code. */
export function isLedgerError(err: unknown, code?: ExitCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
