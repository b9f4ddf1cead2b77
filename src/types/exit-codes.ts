/**
 * pv exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = refusals caused by existing state.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  PARSE_ERROR = 5,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,

  // === STRUCTURE ERRORS (10-19) ===
  UNKNOWN_PHASE = 10,

  // === IDENTIFIER ERRORS (20-29) ===
  INVALID_IDENTIFIER = 22,

  // === STATE CODES (100+) ===
  ALREADY_EXISTS = 101,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
