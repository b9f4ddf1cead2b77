/**
 * Configuration engine for pv.
 *
 * Resolution priority: Environment vars > Project config > Defaults
 */

import type {
  LogLevel,
  OutputFormat,
  PlanViewConfig,
} from '../types/config.js';
import { LOG_LEVELS, OUTPUT_FORMATS } from '../types/config.js';
import { isJsonObject, readJson } from '../store/json.js';
import { getConfigPath } from './paths.js';
import { PlanError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
export const DEFAULTS: PlanViewConfig = {
  backup: {
    maxBackups: 5,
    dir: '.claude/plan-view',
  },
  output: {
    defaultFormat: 'human',
  },
  logging: {
    level: 'info',
    filePath: 'logs/pv.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'PV_MAX_BACKUPS': 'backup.maxBackups',
  'PV_BACKUP_DIR': 'backup.dir',
  'PV_FORMAT': 'output.defaultFormat',
  'PV_LOG_LEVEL': 'logging.level',
  'PV_LOG_FILE': 'logging.filePath',
};

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isJsonObject(sourceVal) && isJsonObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

function invalid(path: string, expected: string, value: unknown): PlanError {
  return new PlanError(
    ExitCode.CONFIG_ERROR,
    `Invalid config value for ${path}: expected ${expected}, got ${JSON.stringify(value)}`,
  );
}

function readCount(merged: Record<string, unknown>, path: string): number {
  const value = getNestedValue(merged, path);
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw invalid(path, 'a non-negative integer', value);
  }
  return value;
}

function readPositive(merged: Record<string, unknown>, path: string): number {
  const value = getNestedValue(merged, path);
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw invalid(path, 'a positive integer', value);
  }
  return value;
}

function readString(merged: Record<string, unknown>, path: string): string {
  const value = getNestedValue(merged, path);
  if (typeof value !== 'string' || value === '') {
    throw invalid(path, 'a non-empty string', value);
  }
  return value;
}

function readChoice<T extends string>(
  merged: Record<string, unknown>,
  path: string,
  choices: readonly T[],
): T {
  const value = getNestedValue(merged, path);
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw invalid(path, `one of ${choices.join(', ')}`, value);
  }
  return match;
}

/**
 * Load and merge configuration for a plan file.
 * Priority: defaults < project config < environment vars
 *
 * @param planPath - Absolute path of the plan file; the project config lives in its state directory
 */
export async function loadConfig(planPath: string): Promise<PlanViewConfig> {
  let merged: Record<string, unknown> = {
    backup: { ...DEFAULTS.backup },
    output: { ...DEFAULTS.output },
    logging: { ...DEFAULTS.logging },
  };

  const configPath = getConfigPath(planPath);
  const projectConfig = await readJson(configPath);
  if (projectConfig !== null) {
    if (!isJsonObject(projectConfig)) {
      throw new PlanError(ExitCode.CONFIG_ERROR, `Config file is not a JSON object: ${configPath}`);
    }
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, keyPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, keyPath, parseEnvValue(envValue));
    }
  }

  return {
    backup: {
      maxBackups: readPositive(merged, 'backup.maxBackups'),
      dir: readString(merged, 'backup.dir'),
    },
    output: {
      defaultFormat: readChoice<OutputFormat>(merged, 'output.defaultFormat', OUTPUT_FORMATS),
    },
    logging: {
      level: readChoice<LogLevel>(merged, 'logging.level', LOG_LEVELS),
      filePath: readString(merged, 'logging.filePath'),
      maxFileSize: readCount(merged, 'logging.maxFileSize'),
      maxFiles: readCount(merged, 'logging.maxFiles'),
    },
  };
}
