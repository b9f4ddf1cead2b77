/**
 * JSON output formatting for --json mode.
 *
 * Success payloads are printed as-is; errors use PlanError.toJSON().
 */

import { PlanError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Pretty-print a success payload. */
export function formatSuccess<T>(data: T): string {
  return JSON.stringify(data ?? null, null, 2);
}

/** Format an error as `{success:false, error:{...}}`. */
export function formatError(error: PlanError): string {
  return JSON.stringify(error.toJSON(), null, 2);
}

/**
 * Wrap any thrown value as a PlanError so callers get an exit code.
 */
export function toPlanError(err: unknown): PlanError {
  if (err instanceof PlanError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PlanError(ExitCode.GENERAL_ERROR, message, { cause: err });
}
