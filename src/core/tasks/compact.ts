/**
 * Lossy compaction of completed tasks.
 *
 * Callers must back up the plan file before writing a compacted plan.
 */

import type { Plan, Task, TaskTracking } from '../../types/plan.js';

/** Fields a compacted task keeps. */
export const COMPACT_TASK_KEYS = ['id', 'title', 'status', 'tracking'] as const;

export interface CompactTaskResult {
  task: Task;
  modified: boolean;
}

function isMinimal(task: Task): boolean {
  const keys = Object.keys(task);
  const trackingKeys = Object.keys(task.tracking ?? {});
  return (
    keys.length === COMPACT_TASK_KEYS.length &&
    COMPACT_TASK_KEYS.every((k) => k in task) &&
    trackingKeys.every((k) => k === 'completed_at')
  );
}

/**
 * Reduce a completed task to `{id, title, status, tracking}`, keeping only
 * `tracking.completed_at`. Other tasks are returned unchanged.
 */
export function compactTask(task: Task): CompactTaskResult {
  if (task.status !== 'completed' || isMinimal(task)) {
    return { task, modified: false };
  }

  const tracking: TaskTracking = {};
  const completedAt = task.tracking?.completed_at;
  if (completedAt !== undefined) tracking.completed_at = completedAt;

  return {
    task: { id: task.id, title: task.title, status: task.status, tracking },
    modified: true,
  };
}

/**
 * Compact every completed task in place.
 * Returns the number of tasks that changed.
 */
export function compactPlan(plan: Plan): number {
  let modified = 0;
  for (const phase of plan.phases) {
    phase.tasks = phase.tasks.map((task) => {
      const result = compactTask(task);
      if (result.modified) modified++;
      return result.task;
    });
  }
  return modified;
}

/** Number of tasks compactPlan would change, without touching the plan. */
export function countCompactable(plan: Plan): number {
  return plan.phases
    .flatMap((p) => p.tasks)
    .filter((t) => compactTask(t).modified).length;
}
