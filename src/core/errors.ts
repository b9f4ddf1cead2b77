/**
 * pv error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for plan operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class PlanError extends Error {
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
    this.name = 'PlanError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for --json output. */
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
