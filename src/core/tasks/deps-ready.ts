/**
 * Shared dependency-readiness check.
 *
 * Used by the next-task search, the upcoming-task classification and the
 * task views to decide whether a task's dependencies are all satisfied.
 */

import type { Plan, Task } from '../../types/plan.js';

/** Only completed tasks satisfy a dependency. */
const SATISFIED_STATUSES = new Set<string>(['completed']);

/** Build an ID → task lookup over every phase. */
export function buildTaskLookup(plan: Plan): Map<string, Task> {
  const lookup = new Map<string, Task>();
  for (const phase of plan.phases) {
    for (const task of phase.tasks) {
      if (!lookup.has(task.id)) lookup.set(task.id, task);
    }
  }
  return lookup;
}

/**
 * Check if all dependencies of a task are satisfied.
 *
 * An ID that resolves to no task is unmet, so dangling references and
 * dependency cycles keep a task waiting forever.
 *
 * @param depends - Dependency task IDs (may be undefined/empty)
 * @param taskLookup - Map from task ID to task
 * @returns true if every dependency is completed, or if there are none
 */
export function depsReady(
  depends: readonly string[] | undefined,
  taskLookup: ReadonlyMap<string, Pick<Task, 'status'>>,
): boolean {
  if (!depends || depends.length === 0) return true;
  return depends.every((depId) => {
    const dep = taskLookup.get(depId);
    return dep !== undefined && SATISFIED_STATUSES.has(dep.status);
  });
}

/** Dependency IDs of a task that are not yet satisfied, in declared order. */
export function unmetDeps(
  task: Task,
  taskLookup: ReadonlyMap<string, Pick<Task, 'status'>>,
): string[] {
  return (task.depends_on ?? []).filter((depId) => !depsReady([depId], taskLookup));
}

/** Convenience form of depsReady for a single task. */
export function depsMet(task: Task, plan: Plan): boolean {
  return depsReady(task.depends_on, buildTaskLookup(plan));
}
