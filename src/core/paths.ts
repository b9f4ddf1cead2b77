/**
 * Path resolution for plan files and their state directory.
 *
 * Environment variables:
 *   PV_FILE       - Plan file used when --file is not given (default: plan.json)
 *   PV_STATE_DIR  - State directory, relative to the plan file's directory
 *                   (default: .claude/plan-view)
 */

import { resolve, dirname, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

export const DEFAULT_PLAN_FILE = 'plan.json';
export const DEFAULT_STATE_DIR = '.claude/plan-view';

/** Plan file name or path, before resolution. */
export function getPlanFileName(): string {
  return process.env['PV_FILE'] ?? DEFAULT_PLAN_FILE;
}

/**
 * Resolve the plan file to an absolute path.
 * Expands a leading tilde; relative paths resolve against cwd.
 */
export function resolvePlanPath(file?: string, cwd?: string): string {
  return resolveFrom(cwd ?? process.cwd(), file ?? getPlanFileName());
}

/** Directory holding the plan file. */
export function getPlanDir(planPath: string): string {
  return dirname(planPath);
}

/**
 * Absolute state directory for a plan file (config, logs, backups).
 */
export function getStateDir(planPath: string): string {
  const stateDir = process.env['PV_STATE_DIR'] ?? DEFAULT_STATE_DIR;
  return resolveFrom(getPlanDir(planPath), stateDir);
}

/** Project config file for a plan file. */
export function getConfigPath(planPath: string): string {
  return join(getStateDir(planPath), 'config.json');
}

/**
 * Absolute backup directory. A relative `backup.dir` setting resolves
 * against the plan file's directory.
 */
export function getBackupDir(planPath: string, backupDir: string): string {
  return resolveFrom(getPlanDir(planPath), backupDir);
}

/**
 * Resolve `path` against `base` unless it is already absolute.
 */
export function resolveFrom(base: string, path: string): string {
  if (isAbsolutePath(path)) return path;
  if (path === '~' || path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(base, path);
}

/**
 * Check if a path is absolute (POSIX or Windows).
 */
export function isAbsolutePath(path: string): boolean {
  return isAbsolute(path) || /^[A-Za-z]:[\\/]/.test(path);
}
