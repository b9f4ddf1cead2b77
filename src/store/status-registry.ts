/**
 * Status registry: single source of truth for task and phase status enums.
 *
 * All status constants and display symbols MUST be defined here.
 * Renderers, validators and engine modules import from this file instead of
 * hardcoding status comparisons.
 */

export const TASK_STATUSES = [
  'pending', 'in_progress', 'completed', 'blocked', 'skipped',
] as const;

/** Phases share the task status vocabulary; their status is derived on save. */
export const PHASE_STATUSES = TASK_STATUSES;

/** Reserved triage phases, in their fixed sort order. */
export const RESERVED_PHASE_IDS = ['bugs', 'ideas', 'deferred'] as const;

// === DERIVED TYPES ===

export type TaskStatus = typeof TASK_STATUSES[number];
export type PhaseStatus = typeof PHASE_STATUSES[number];
export type ReservedPhaseId = typeof RESERVED_PHASE_IDS[number];

// === TERMINAL STATE SETS ===

/** Phases in these states are never searched for work. */
export const TERMINAL_PHASE_STATUSES: ReadonlySet<PhaseStatus> =
  new Set(['completed', 'skipped']);

export function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

export function isReservedPhaseId(value: string): value is ReservedPhaseId {
  return RESERVED_PHASE_IDS.some((id) => id === value);
}

// === DISPLAY ICONS ===
// Typed Record maps; the compiler checks every status has an entry.

/**
 * Task status → emoji icon (Unicode-enabled terminals).
 * Falls back to TASK_STATUS_SYMBOLS_ASCII when Unicode is unavailable.
 */
export const TASK_STATUS_SYMBOLS_UNICODE: Record<TaskStatus, string> = {
  completed:   '\u2705',              // check mark button
  in_progress: '\uD83D\uDD04',        // counterclockwise arrows
  pending:     '\u23F3',              // hourglass
  blocked:     '\uD83D\uDED1',        // stop sign
  skipped:     '\u23ED\uFE0F',        // next track
};

/**
 * Task status → ASCII fallback symbol (non-Unicode terminals, CI output).
 */
export const TASK_STATUS_SYMBOLS_ASCII: Record<TaskStatus, string> = {
  completed:   '[x]',
  in_progress: '[>]',
  pending:     '[ ]',
  blocked:     '[!]',
  skipped:     '[-]',
};
