/**
 * JSON read helpers for plan and config files.
 */

import { safeReadFile } from './atomic.js';
import { PlanError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Parse JSON text, raising PARSE_ERROR with the source path on failure.
 */
export function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new PlanError(
      ExitCode.PARSE_ERROR,
      `Invalid JSON in ${filePath}: ${detail}`,
      { cause: err },
    );
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return parseJson(content, filePath);
}

/**
 * Read a JSON file, throwing if it doesn't exist.
 * A file holding the literal `null` is returned as null, not reported missing.
 */
export async function readJsonRequired(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new PlanError(
      ExitCode.NOT_FOUND,
      `${filePath} not found`,
      { fix: 'Create one with: pv init "<project name>"' },
    );
  }
  return parseJson(content, filePath);
}

/** Narrow an unknown JSON value to a plain object. */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
