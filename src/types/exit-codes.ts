/**
 * Taskledger error codes.
 * Ranges: 0 = success, 1-99 = errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  PRECONDITION_FAILED = 6,
  CONFIG_ERROR = 8,

  // === HIERARCHY ERRORS (10-19) ===
  PARENT_NOT_FOUND = 10,

  // === CONCURRENCY ERRORS (20-29) ===
  CONCURRENT_MODIFICATION = 21,
  NUMBER_COLLISION = 22,

  // === STATE MACHINE (80-84) ===
  STATUS_TRANSITION_INVALID = 83,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code represents success. */
export function isSuccessCode(code: ExitCode): boolean {
  return code === ExitCode.SUCCESS;
}

/**
 * Check if an exit code is recoverable (retry may succeed).
 * Only a stale optimistic-lock write qualifies: the caller re-reads and retries.
 */
export function isRecoverableCode(code: ExitCode): boolean {
  return code === ExitCode.CONCURRENT_MODIFICATION;
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
