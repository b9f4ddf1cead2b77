/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when Unicode is not supported.
 *
 * Status symbols are sourced from the registry (TASK_STATUS_SYMBOLS_UNICODE /
 * TASK_STATUS_SYMBOLS_ASCII) to keep icon definitions co-located with the
 * status values they describe.
 */
import {
  TASK_STATUS_SYMBOLS_UNICODE,
  TASK_STATUS_SYMBOLS_ASCII,
  type TaskStatus,
} from '../../store/status-registry.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether emoji are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status symbols and colors
// ---------------------------------------------------------------------------

/** Map task or phase status to a display symbol. */
export function statusSymbol(status: TaskStatus): string {
  const map = unicodeEnabled ? TASK_STATUS_SYMBOLS_UNICODE : TASK_STATUS_SYMBOLS_ASCII;
  return map[status];
}

/** Map task status to a color escape. */
export function statusColor(status: TaskStatus): string {
  switch (status) {
    case 'pending':     return CYAN;
    case 'in_progress': return YELLOW;
    case 'completed':   return GREEN;
    case 'blocked':     return RED;
    case 'skipped':     return DIM;
  }
}

/** Readiness of an upcoming task, as shown by `pv future`. */
export type Readiness = 'active' | 'ready' | 'waiting' | 'blocked';

/** Map upcoming-task readiness to a display symbol. */
export function readinessSymbol(readiness: Readiness): string {
  if (unicodeEnabled) {
    switch (readiness) {
      case 'active':  return '\uD83D\uDD04';  // counterclockwise arrows
      case 'ready':   return '\uD83D\uDC49';  // pointing finger
      case 'waiting': return '\u23F3';        // hourglass
      case 'blocked': return '\uD83D\uDEAB';  // no entry sign
    }
  }
  switch (readiness) {
    case 'active':  return '>';
    case 'ready':   return '*';
    case 'waiting': return '.';
    case 'blocked': return '!';
  }
}

/** Format a date string as YYYY-MM-DD. */
export function shortDate(isoDate: string | null | undefined): string {
  if (!isoDate) return '';
  return isoDate.split('T')[0] ?? isoDate;
}

/** Format a percentage with no decimals. */
export function pct(value: number): string {
  return `${Math.round(value)}%`;
}
