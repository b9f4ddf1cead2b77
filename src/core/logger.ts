/**
 * Centralized pino logger factory for pv.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout carries command output (and --json payloads), so diagnostics go to
 * the log file. Before initialisation a warn-level stderr logger is used.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

let rootLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: string;
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
}

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param stateDir - Absolute path to the plan's state directory (.claude/plan-view)
 * @param config   - The `logging` section of the resolved config
 */
export function initLogger(stateDir: string, config: LoggerConfig): pino.Logger {
  const dest = join(stateDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread; pino-roll handles size + daily rotation.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: engine code used as a library, and tests,
 * get the stderr fallback.
 *
 * @param subsystem - Logical subsystem name (e.g. 'store', 'relocate', 'backup')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    return pino(
      {
        level: 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    ).child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}
