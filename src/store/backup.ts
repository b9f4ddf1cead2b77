/**
 * Numbered backup system for plan files.
 * Maintains a rotating window of pre-write snapshots: `<file>.1` is always
 * the newest, `<file>.<max>` the oldest kept.
 */

import { copyFile, readdir, readFile, unlink, rename, mkdir } from 'node:fs/promises';
import { join, basename } from 'node:path';
import { PlanError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { atomicWrite, isErrnoCode, safeReadFile } from './atomic.js';

export const DEFAULT_MAX_BACKUPS = 5;

/** A numbered backup on disk. */
export interface BackupEntry {
  number: number;
  path: string;
}

function validateMaxBackups(maxBackups: number): void {
  if (!Number.isInteger(maxBackups) || maxBackups < 1) {
    throw new PlanError(
      ExitCode.INVALID_INPUT,
      `max backups must be a positive integer, got ${maxBackups}`,
    );
  }
}

async function unlinkIfExists(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (!isErrnoCode(err, 'ENOENT')) throw err;
  }
}

async function renameIfExists(from: string, to: string): Promise<boolean> {
  try {
    await rename(from, to);
    return true;
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return false;
    throw err;
  }
}

/**
 * Shift `<file>.i` to `<file>.(i+1)` for i = max-1 down to 1, dropping
 * `<file>.<max>` first. Leaves slot 1 free.
 */
export async function rotateBackups(
  backupDir: string,
  fileName: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<void> {
  validateMaxBackups(maxBackups);
  try {
    await unlinkIfExists(join(backupDir, `${fileName}.${maxBackups}`));
    for (let i = maxBackups - 1; i >= 1; i--) {
      const shifted = await renameIfExists(
        join(backupDir, `${fileName}.${i}`),
        join(backupDir, `${fileName}.${i + 1}`),
      );
      if (shifted) {
        getLogger('backup').debug({ fileName, from: i, to: i + 1 }, 'Backup shifted');
      }
    }
  } catch (err) {
    throw new PlanError(
      ExitCode.FILE_ERROR,
      `Backup rotation failed in: ${backupDir}`,
      { cause: err },
    );
  }
}

/**
 * Create a numbered backup of a file.
 * Rotates existing backups, then copies the current file to `<file>.1`.
 */
export async function createBackup(
  filePath: string,
  backupDir: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<string> {
  const fileName = basename(filePath);
  try {
    await mkdir(backupDir, { recursive: true });
  } catch (err) {
    throw new PlanError(
      ExitCode.FILE_ERROR,
      `Cannot create backup directory: ${backupDir}`,
      { cause: err },
    );
  }

  await rotateBackups(backupDir, fileName, maxBackups);

  const backupPath = join(backupDir, `${fileName}.1`);
  try {
    await copyFile(filePath, backupPath);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new PlanError(
        ExitCode.FILE_ERROR,
        `Cannot backup: source file not found: ${filePath}`,
        { cause: err },
      );
    }
    throw new PlanError(ExitCode.FILE_ERROR, `Backup failed for: ${filePath}`, { cause: err });
  }

  getLogger('backup').info({ backupPath, maxBackups }, 'Backup created');
  return backupPath;
}

/**
 * List existing backups for a file in ascending number order, so the
 * newest (`.1`) comes first.
 */
export async function listBackups(
  fileName: string,
  backupDir: string,
): Promise<BackupEntry[]> {
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return [];
    throw new PlanError(ExitCode.FILE_ERROR, `Cannot read backups in: ${backupDir}`, { cause: err });
  }

  const prefix = `${fileName}.`;
  return entries
    .filter((e) => e.startsWith(prefix) && /^\d+$/.test(e.slice(prefix.length)))
    .map((e) => ({
      number: Number.parseInt(e.slice(prefix.length), 10),
      path: join(backupDir, e),
    }))
    .sort((a, b) => a.number - b.number);
}

/**
 * Pick a backup by number, or the newest when no number is given.
 * Throws NOT_FOUND listing the available numbers.
 */
export function selectBackup(
  backups: BackupEntry[],
  fileName: string,
  number?: number,
): BackupEntry {
  const chosen = number === undefined
    ? backups[0]
    : backups.find((b) => b.number === number);
  if (!chosen) {
    const available = backups.map((b) => b.number).join(', ');
    throw new PlanError(
      ExitCode.NOT_FOUND,
      number === undefined
        ? `No backups found for: ${fileName}`
        : `Backup ${fileName}.${number} not found`,
      available ? { fix: `Available backups: ${available}` } : undefined,
    );
  }
  return chosen;
}

/** Outcome of a restore. */
export interface RestoreResult {
  /** The backup that was restored, numbered as it was before the restore. */
  restored: BackupEntry;
  /** Backup taken of the replaced file, or null when there was no file. */
  backup: string | null;
}

/**
 * Restore a file from a numbered backup (the newest when no number is given).
 *
 * The file being replaced is backed up first, which renumbers every backup,
 * so the chosen backup is read before rotation.
 */
export async function restoreFromBackup(
  fileName: string,
  backupDir: string,
  targetPath: string,
  number?: number,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<RestoreResult> {
  validateMaxBackups(maxBackups);
  const restored = selectBackup(await listBackups(fileName, backupDir), fileName, number);

  let content: string;
  try {
    content = await readFile(restored.path, 'utf8');
  } catch (err) {
    throw new PlanError(ExitCode.FILE_ERROR, `Restore failed from: ${restored.path}`, { cause: err });
  }

  const backup = await safeReadFile(targetPath) === null
    ? null
    : await createBackup(targetPath, backupDir, maxBackups);

  await atomicWrite(targetPath, content);
  getLogger('backup').info({ from: restored.path, to: targetPath, backup }, 'Backup restored');
  return { restored, backup };
}
