/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig } from '../config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { rejectsWithPlanError } from './fixtures.js';

const ENV_KEYS = ['PV_MAX_BACKUPS', 'PV_BACKUP_DIR', 'PV_FORMAT', 'PV_LOG_LEVEL', 'PV_LOG_FILE', 'PV_STATE_DIR'];

describe('loadConfig', () => {
  let tempDir: string;
  let planPath: string;
  let stateDir: string;
  const origEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pv-config-'));
    planPath = join(tempDir, 'plan.json');
    stateDir = join(tempDir, '.claude', 'plan-view');
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of origEnv) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  async function writeProjectConfig(config: unknown): Promise<void> {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'config.json'), JSON.stringify(config));
  }

  it('returns defaults when no config file exists', async () => {
    const config = await loadConfig(planPath);
    expect(config).toEqual({
      backup: { maxBackups: 5, dir: '.claude/plan-view' },
      output: { defaultFormat: 'human' },
      logging: {
        level: 'info',
        filePath: 'logs/pv.log',
        maxFileSize: 10 * 1024 * 1024,
        maxFiles: 5,
      },
    });
  });

  it('merges project config over defaults', async () => {
    await writeProjectConfig({ backup: { maxBackups: 2 }, output: { defaultFormat: 'json' } });
    const config = await loadConfig(planPath);
    expect(config.backup).toEqual({ maxBackups: 2, dir: '.claude/plan-view' });
    expect(config.output.defaultFormat).toBe('json');
    expect(config.logging.level).toBe('info');
  });

  it('environment variables override the config file', async () => {
    await writeProjectConfig({ backup: { maxBackups: 2 } });
    process.env['PV_MAX_BACKUPS'] = '9';
    process.env['PV_LOG_LEVEL'] = 'debug';
    const config = await loadConfig(planPath);
    expect(config.backup.maxBackups).toBe(9);
    expect(config.logging.level).toBe('debug');
  });

  it('reads the config from PV_STATE_DIR', async () => {
    process.env['PV_STATE_DIR'] = 'state';
    await mkdir(join(tempDir, 'state'), { recursive: true });
    await writeFile(join(tempDir, 'state', 'config.json'), JSON.stringify({ backup: { dir: 'snapshots' } }));
    const config = await loadConfig(planPath);
    expect(config.backup.dir).toBe('snapshots');
  });

  it('rejects an unknown output format', async () => {
    process.env['PV_FORMAT'] = 'yaml';
    const err = await rejectsWithPlanError(loadConfig(planPath));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
    expect(err.message).toBe('Invalid config value for output.defaultFormat: expected one of human, json, got "yaml"');
  });

  it('rejects a negative backup count', async () => {
    await writeProjectConfig({ backup: { maxBackups: -1 } });
    const err = await rejectsWithPlanError(loadConfig(planPath));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
    expect(err.message).toContain('backup.maxBackups');
  });

  it('rejects a backup limit of zero at load time', async () => {
    await writeProjectConfig({ backup: { maxBackups: 0 } });
    const err = await rejectsWithPlanError(loadConfig(planPath));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
    expect(err.message).toBe('Invalid config value for backup.maxBackups: expected a positive integer, got 0');
  });

  it('rejects a config file that is not an object', async () => {
    await writeProjectConfig([1, 2]);
    const err = await rejectsWithPlanError(loadConfig(planPath));
    expect(err.code).toBe(ExitCode.CONFIG_ERROR);
  });

  it('reports malformed config JSON as PARSE_ERROR', async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, 'config.json'), '{ backup: ');
    const err = await rejectsWithPlanError(loadConfig(planPath));
    expect(err.code).toBe(ExitCode.PARSE_ERROR);
  });
});
