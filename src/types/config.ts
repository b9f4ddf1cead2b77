/**
 * Configuration type definitions for pv.
 */

/** Output format options. */
export type OutputFormat = 'human' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json'];

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent',
];

/** Backup configuration. */
export interface BackupConfig {
  /** Number of numbered snapshots kept by compaction. */
  maxBackups: number;
  /** Backup directory, relative to the plan file's directory unless absolute. */
  dir: string;
}

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the state directory (default: 'logs/pv.log') */
  filePath: string;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Resolved pv configuration. */
export interface PlanViewConfig {
  backup: BackupConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}
