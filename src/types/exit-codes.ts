/**
 * trellis exit codes.
 * Ranges: 0 = success, 1-9 = general, 10+ = one block per subsystem.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === GRAPH ERRORS (10-19) ===
  INVALID_HANDLE = 10,
  MALFORMED_HANDLE = 11,
  INVALID_ALIAS = 12,
  INVALID_DATE = 13,
  MALFORMED_DATE = 14,
  CYCLE_DETECTED = 15,
  NOT_TASK_NODE = 16,

  // === DOCUMENT ERRORS (20-29) ===
  PARSE_ERROR = 20,
  UNSUPPORTED_VERSION = 21,

  // === BLUEPRINT ERRORS (30-39) ===
  BLUEPRINT_NOT_FOUND = 30,
  BLUEPRINT_EXISTS = 31,
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  return code === ExitCode.LOCK_TIMEOUT;
}

/** Get a human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
