/**
 * Progress aggregation: per-phase counters, derived phase status and the
 * plan summary. Every save runs this before serializing.
 */

import type { Phase, PhaseProgress, Plan, PlanSummary } from '../../types/plan.js';

function percentage(completed: number, total: number): number {
  return total > 0 ? (100 * completed) / total : 0;
}

/**
 * Recompute one phase's progress and derive its status.
 *
 * A manually set `blocked` or `skipped` status survives until the phase has
 * tasks in motion or is fully done.
 */
export function recalculatePhase(phase: Phase): PhaseProgress {
  const total = phase.tasks.length;
  const completed = phase.tasks.filter((t) => t.status === 'completed').length;
  const hasActive = phase.tasks.some((t) => t.status === 'in_progress');

  phase.progress = { completed, total, percentage: percentage(completed, total) };

  if (total > 0 && completed === total) {
    phase.status = 'completed';
  } else if (hasActive || completed > 0) {
    phase.status = 'in_progress';
  }

  return phase.progress;
}

/**
 * Recompute every phase and the plan summary in place.
 * Idempotent: a second run over an unchanged plan changes nothing.
 */
export function recalculateProgress(plan: Plan): PlanSummary {
  let totalTasks = 0;
  let completedTasks = 0;

  for (const phase of plan.phases) {
    const progress = recalculatePhase(phase);
    totalTasks += progress.total;
    completedTasks += progress.completed;
  }

  plan.summary = {
    total_phases: plan.phases.length,
    total_tasks: totalTasks,
    completed_tasks: completedTasks,
    overall_progress: percentage(completedTasks, totalTasks),
  };

  return plan.summary;
}
