/**
 * Dependency resolution: the next actionable task and the forward-looking
 * classification of open work.
 */

import { TERMINAL_PHASE_STATUSES } from '../../store/status-registry.js';
import { isReservedPhase } from '../phases/index.js';
import { buildTaskLookup, depsReady } from './deps-ready.js';
import type { Phase, PhaseTask, Plan, Task } from '../../types/plan.js';

/** An open task with its phase and whether it can be picked up now. */
export interface UpcomingTask {
  task: Task;
  phase: Phase;
  actionable: boolean;
}

/**
 * Find the task to work on next.
 *
 * Phases are scanned in stored order, skipping completed and skipped phases.
 * The first task that is either `in_progress`, or `pending` with every
 * dependency completed, wins; in-progress work is returned as soon as it is
 * reached rather than ranked above earlier pending tasks.
 */
export function getNextTask(plan: Plan): PhaseTask | null {
  const lookup = buildTaskLookup(plan);

  for (const phase of plan.phases) {
    if (TERMINAL_PHASE_STATUSES.has(phase.status)) continue;

    for (const task of phase.tasks) {
      if (task.status === 'in_progress') {
        return { phase, task };
      }
      if (task.status === 'pending' && depsReady(task.depends_on, lookup)) {
        return { phase, task };
      }
    }
  }

  return null;
}

/** Group rank: in progress, then ready, then waiting, then blocked. */
function upcomingRank(entry: UpcomingTask): number {
  switch (entry.task.status) {
    case 'in_progress':
      return 0;
    case 'pending':
      return entry.actionable ? 1 : 2;
    default:
      return 3;
  }
}

/**
 * Classify every open task in the working phases.
 *
 * Covers in-progress, pending and blocked tasks of phases that are neither
 * reserved nor completed/skipped. The result is grouped as in progress,
 * pending and ready, pending and waiting, blocked; each group keeps
 * phase-then-task scan order.
 */
export function classifyUpcoming(plan: Plan): UpcomingTask[] {
  const lookup = buildTaskLookup(plan);
  const entries: UpcomingTask[] = [];

  for (const phase of plan.phases) {
    if (isReservedPhase(phase)) continue;
    if (TERMINAL_PHASE_STATUSES.has(phase.status)) continue;

    for (const task of phase.tasks) {
      switch (task.status) {
        case 'in_progress':
          entries.push({ task, phase, actionable: true });
          break;
        case 'pending':
          entries.push({ task, phase, actionable: depsReady(task.depends_on, lookup) });
          break;
        case 'blocked':
          entries.push({ task, phase, actionable: false });
          break;
        default:
          break;
      }
    }
  }

  // Array.prototype.sort is stable, so scan order survives within a group.
  return entries.sort((a, b) => upcomingRank(a) - upcomingRank(b));
}
