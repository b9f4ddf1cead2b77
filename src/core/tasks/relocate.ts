/**
 * Moving tasks between phases, including the reserved triage phases.
 *
 * A relocated task gets a fresh ID in its target phase and loses its
 * dependencies; nothing that depended on the old ID is rewritten.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { isReservedPhaseId, RESERVED_PHASE_IDS } from '../../store/status-registry.js';
import { ensureReservedPhase, findPhase, formatPhaseSuggestions } from '../phases/index.js';
import { allocateTaskId } from './id.js';
import { appendNewTask } from './add.js';
import { findTask, requireTask } from './find.js';
import type { Phase, Plan, ReservedPhaseId, Task } from '../../types/plan.js';

/** Result of relocating a task. */
export interface RelocateResult {
  task: Task;
  fromPhase: Phase;
  toPhase: Phase;
  oldId: string;
  newId: string;
}

/** Result of a triage command: an existing task moved, or a new one captured. */
export type TriageResult =
  | ({ kind: 'moved' } & RelocateResult)
  | { kind: 'created'; task: Task; toPhase: Phase };

/**
 * Resolve a relocation target, creating a reserved phase on first use.
 */
function resolveTarget(plan: Plan, targetPhaseId: string): Phase {
  if (isReservedPhaseId(targetPhaseId)) {
    return ensureReservedPhase(plan, targetPhaseId);
  }
  const phase = findPhase(plan, targetPhaseId);
  if (!phase) {
    throw new PlanError(
      ExitCode.UNKNOWN_PHASE,
      `Unknown phase '${targetPhaseId}': not an existing phase or one of ${RESERVED_PHASE_IDS.join(', ')}`,
      { fix: formatPhaseSuggestions(plan) },
    );
  }
  return phase;
}

/**
 * Move a task into another phase.
 *
 * The target must exist unless it is a reserved phase. The task keeps every
 * field except `id`, which is reallocated in the target, and `depends_on`,
 * which is emptied.
 */
export function relocateTask(plan: Plan, taskId: string, targetPhaseId: string): RelocateResult {
  const { phase: fromPhase, task } = requireTask(plan, taskId);
  const toPhase = resolveTarget(plan, targetPhaseId);

  fromPhase.tasks = fromPhase.tasks.filter((t) => t !== task);

  const oldId = task.id;
  const newId = allocateTaskId(toPhase);
  task.id = newId;
  task.depends_on = [];
  toPhase.tasks.push(task);

  getLogger('relocate').info(
    { oldId, newId, from: fromPhase.id, to: toPhase.id },
    'Task relocated',
  );

  return { task, fromPhase, toPhase, oldId, newId };
}

/**
 * Send an existing task to a reserved phase, or capture free text there as a
 * new pending task when no task has that ID.
 */
function triage(plan: Plan, idOrTitle: string, target: ReservedPhaseId): TriageResult {
  if (findTask(plan, idOrTitle)) {
    return { kind: 'moved', ...relocateTask(plan, idOrTitle, target) };
  }
  const toPhase = ensureReservedPhase(plan, target);
  const task = appendNewTask(toPhase, idOrTitle);
  getLogger('relocate').info({ id: task.id, to: target }, 'Task captured');
  return { kind: 'created', task, toPhase };
}

/**
 * Defer a task (or capture a new deferred one), recording a non-blank reason
 * as `tracking.defer_reason`.
 */
export function deferTask(plan: Plan, idOrTitle: string, reason?: string): TriageResult {
  const result = triage(plan, idOrTitle, 'deferred');
  const trimmed = reason?.trim();
  if (trimmed) {
    result.task.tracking = { ...result.task.tracking, defer_reason: trimmed };
  }
  return result;
}

/** Move a task (or capture a new one) into the bugs phase. */
export function markAsBug(plan: Plan, idOrTitle: string): TriageResult {
  return triage(plan, idOrTitle, 'bugs');
}

/** Move a task (or capture a new one) into the ideas phase. */
export function captureIdea(plan: Plan, idOrTitle: string): TriageResult {
  return triage(plan, idOrTitle, 'ideas');
}
