/**
 * Tests for atomic file operations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { atomicWrite, atomicWriteJson, isErrnoCode, safeReadFile, serializeJson } from '../atomic.js';
import { ExitCode } from '../../types/exit-codes.js';
import { rejectsWithPlanError } from '../../core/__tests__/fixtures.js';

describe('atomic file operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pv-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates parent directories if needed', async () => {
    const filePath = join(tempDir, 'nested', 'dir', 'plan.json');
    await atomicWrite(filePath, 'nested content');
    expect(await readFile(filePath, 'utf8')).toBe('nested content');
  });

  it('replaces an existing file without leaving temp files behind', async () => {
    const filePath = join(tempDir, 'plan.json');
    await atomicWrite(filePath, 'first');
    await atomicWrite(filePath, 'second');
    expect(await readFile(filePath, 'utf8')).toBe('second');
    expect(await readdir(tempDir)).toEqual(['plan.json']);
  });

  it('writes JSON with 2-space indent and a trailing newline', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWriteJson(filePath, { key: 'value', num: 42 });
    expect(await readFile(filePath, 'utf8')).toBe('{\n  "key": "value",\n  "num": 42\n}\n');
  });

  it('raises FILE_ERROR when the target cannot be written', async () => {
    const blocker = join(tempDir, 'blocker');
    await writeFile(blocker, 'a file, not a directory');
    const err = await rejectsWithPlanError(atomicWrite(join(blocker, 'plan.json'), 'x'));
    expect(err.code).toBe(ExitCode.FILE_ERROR);
  });

  it('reads an existing file and returns null for a missing one', async () => {
    const filePath = join(tempDir, 'test.txt');
    await atomicWrite(filePath, 'content');
    expect(await safeReadFile(filePath)).toBe('content');
    expect(await safeReadFile(join(tempDir, 'nonexistent.txt'))).toBeNull();
  });
});

describe('serializeJson', () => {
  it('supports a custom indent', () => {
    expect(serializeJson({ a: 1 }, 4)).toBe('{\n    "a": 1\n}\n');
  });
});

describe('isErrnoCode', () => {
  it('matches errors by errno code', () => {
    const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isErrnoCode(err, 'ENOENT')).toBe(true);
    expect(isErrnoCode(err, 'EACCES')).toBe(false);
    expect(isErrnoCode('ENOENT', 'ENOENT')).toBe(false);
  });
});
