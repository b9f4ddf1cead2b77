/**
 * Tests for path resolution.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import {
  getBackupDir,
  getConfigPath,
  getStateDir,
  isAbsolutePath,
  resolvePlanPath,
} from '../paths.js';

describe('resolvePlanPath', () => {
  const origFile = process.env['PV_FILE'];

  afterEach(() => {
    if (origFile !== undefined) {
      process.env['PV_FILE'] = origFile;
    } else {
      delete process.env['PV_FILE'];
    }
  });

  it('defaults to plan.json in cwd', () => {
    delete process.env['PV_FILE'];
    expect(resolvePlanPath(undefined, '/work')).toBe('/work/plan.json');
  });

  it('respects PV_FILE', () => {
    process.env['PV_FILE'] = 'docs/roadmap.json';
    expect(resolvePlanPath(undefined, '/work')).toBe('/work/docs/roadmap.json');
  });

  it('prefers an explicit file', () => {
    process.env['PV_FILE'] = 'ignored.json';
    expect(resolvePlanPath('other.json', '/work')).toBe('/work/other.json');
  });

  it('keeps absolute paths', () => {
    expect(resolvePlanPath('/abs/plan.json', '/work')).toBe('/abs/plan.json');
  });

  it('expands a leading tilde', () => {
    expect(resolvePlanPath('~/plan.json', '/work')).toBe(join(homedir(), 'plan.json'));
  });
});

describe('state directory', () => {
  const origState = process.env['PV_STATE_DIR'];

  afterEach(() => {
    if (origState !== undefined) {
      process.env['PV_STATE_DIR'] = origState;
    } else {
      delete process.env['PV_STATE_DIR'];
    }
  });

  it('sits beside the plan file by default', () => {
    delete process.env['PV_STATE_DIR'];
    expect(getStateDir('/work/plan.json')).toBe('/work/.claude/plan-view');
    expect(getConfigPath('/work/plan.json')).toBe('/work/.claude/plan-view/config.json');
  });

  it('respects PV_STATE_DIR', () => {
    process.env['PV_STATE_DIR'] = '/var/pv';
    expect(getStateDir('/work/plan.json')).toBe('/var/pv');
  });
});

describe('getBackupDir', () => {
  it('resolves a relative setting against the plan directory', () => {
    expect(getBackupDir('/work/plan.json', '.claude/plan-view')).toBe('/work/.claude/plan-view');
  });

  it('keeps an absolute setting', () => {
    expect(getBackupDir('/work/plan.json', '/backups')).toBe('/backups');
  });
});

describe('isAbsolutePath', () => {
  it('detects POSIX and Windows absolute paths', () => {
    expect(isAbsolutePath('/usr/bin')).toBe(true);
    expect(isAbsolutePath('C:\\Users')).toBe(true);
    expect(isAbsolutePath('relative/path')).toBe(false);
  });
});
