/**
 * Tests for numbered backup rotation, listing and restore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createBackup,
  listBackups,
  restoreFromBackup,
  rotateBackups,
  selectBackup,
} from '../backup.js';
import { ExitCode } from '../../types/exit-codes.js';
import { catchPlanError, rejectsWithPlanError } from '../../core/__tests__/fixtures.js';

describe('backups', () => {
  let tempDir: string;
  let filePath: string;
  let backupDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pv-backup-'));
    filePath = join(tempDir, 'plan.json');
    backupDir = join(tempDir, 'backups');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function backupVersions(count: number, max: number): Promise<void> {
    for (let v = 1; v <= count; v++) {
      await writeFile(filePath, `version ${v}`);
      await createBackup(filePath, backupDir, max);
    }
  }

  it('copies the file to slot 1 and creates the directory', async () => {
    await writeFile(filePath, 'original');
    const path = await createBackup(filePath, backupDir);
    expect(path).toBe(join(backupDir, 'plan.json.1'));
    expect(await readFile(path, 'utf8')).toBe('original');
  });

  it('keeps slot 1 as the newest and drops the oldest past the limit', async () => {
    await backupVersions(4, 3);

    const backups = await listBackups('plan.json', backupDir);
    expect(backups.map((b) => b.number)).toEqual([1, 2, 3]);
    expect(await readFile(join(backupDir, 'plan.json.1'), 'utf8')).toBe('version 4');
    expect(await readFile(join(backupDir, 'plan.json.2'), 'utf8')).toBe('version 3');
    expect(await readFile(join(backupDir, 'plan.json.3'), 'utf8')).toBe('version 2');
  });

  it('fails with FILE_ERROR when the source is missing', async () => {
    const err = await rejectsWithPlanError(createBackup(filePath, backupDir));
    expect(err.code).toBe(ExitCode.FILE_ERROR);
    expect(err.message).toBe(`Cannot backup: source file not found: ${filePath}`);
  });

  it('rejects a limit below one', async () => {
    const err = await rejectsWithPlanError(rotateBackups(backupDir, 'plan.json', 0));
    expect(err.code).toBe(ExitCode.INVALID_INPUT);
  });

  it('lists nothing when the directory does not exist', async () => {
    expect(await listBackups('plan.json', backupDir)).toEqual([]);
  });

  it('ignores files that are not numbered backups of the same file', async () => {
    await backupVersions(1, 5);
    await writeFile(join(backupDir, 'plan.json.tmp'), 'x');
    await writeFile(join(backupDir, 'other.json.1'), 'x');

    const backups = await listBackups('plan.json', backupDir);
    expect(backups).toEqual([{ number: 1, path: join(backupDir, 'plan.json.1') }]);
  });

  it('restores the newest backup by default', async () => {
    await backupVersions(2, 5);
    await writeFile(filePath, 'broken');

    const { restored } = await restoreFromBackup('plan.json', backupDir, filePath);
    expect(restored.number).toBe(1);
    expect(await readFile(filePath, 'utf8')).toBe('version 2');
  });

  it('restores a numbered backup', async () => {
    await backupVersions(2, 5);
    await restoreFromBackup('plan.json', backupDir, filePath, 2);
    expect(await readFile(filePath, 'utf8')).toBe('version 1');
  });

  it('backs up the replaced file as the newest backup', async () => {
    await backupVersions(1, 5);
    await writeFile(filePath, 'current work');

    const { backup } = await restoreFromBackup('plan.json', backupDir, filePath);
    expect(backup).toBe(join(backupDir, 'plan.json.1'));
    expect(await readFile(filePath, 'utf8')).toBe('version 1');
    expect(await readFile(join(backupDir, 'plan.json.1'), 'utf8')).toBe('current work');
    expect(await readFile(join(backupDir, 'plan.json.2'), 'utf8')).toBe('version 1');
  });

  it('restores without a backup when the target is missing', async () => {
    await backupVersions(1, 5);
    await rm(filePath);

    const { backup } = await restoreFromBackup('plan.json', backupDir, filePath);
    expect(backup).toBeNull();
    expect(await readFile(filePath, 'utf8')).toBe('version 1');
    expect((await listBackups('plan.json', backupDir)).map((b) => b.number)).toEqual([1]);
  });

  it('keeps the replaced file within the backup limit', async () => {
    await backupVersions(2, 2);
    await writeFile(filePath, 'current work');

    await restoreFromBackup('plan.json', backupDir, filePath, 2, 2);
    expect(await readFile(filePath, 'utf8')).toBe('version 1');
    expect(await readFile(join(backupDir, 'plan.json.1'), 'utf8')).toBe('current work');
    expect(await readFile(join(backupDir, 'plan.json.2'), 'utf8')).toBe('version 2');
    expect((await listBackups('plan.json', backupDir)).map((b) => b.number)).toEqual([1, 2]);
  });

  describe('selectBackup', () => {
    const backups = [
      { number: 1, path: '/b/plan.json.1' },
      { number: 2, path: '/b/plan.json.2' },
    ];

    it('returns the first entry without a number', () => {
      expect(selectBackup(backups, 'plan.json')).toEqual(backups[0]);
    });

    it('lists the available numbers when the requested one is missing', () => {
      const err = catchPlanError(() => selectBackup(backups, 'plan.json', 7));
      expect(err.code).toBe(ExitCode.NOT_FOUND);
      expect(err.message).toBe('Backup plan.json.7 not found');
      expect(err.fix).toBe('Available backups: 1, 2');
    });

    it('reports an empty set without a fix', () => {
      const err = catchPlanError(() => selectBackup([], 'plan.json'));
      expect(err.message).toBe('No backups found for: plan.json');
      expect(err.fix).toBeUndefined();
    });
  });
});
