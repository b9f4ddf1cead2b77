/**
 * Task lookup across all phases.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { isReservedPhase } from '../phases/index.js';
import type { PhaseTask, Plan } from '../../types/plan.js';

/** Maximum number of IDs listed in a not-found hint. */
const MAX_SUGGESTIONS = 10;

/** Find a task and the phase holding it. */
export function findTask(plan: Plan, taskId: string): PhaseTask | null {
  for (const phase of plan.phases) {
    const task = phase.tasks.find((t) => t.id === taskId);
    if (task) return { phase, task };
  }
  return null;
}

/**
 * Find a task, throwing NOT_FOUND with nearby IDs as the fix hint.
 */
export function requireTask(plan: Plan, taskId: string): PhaseTask {
  const found = findTask(plan, taskId);
  if (!found) {
    throw new PlanError(ExitCode.NOT_FOUND, `Task '${taskId}' not found`, {
      fix: formatTaskSuggestions(plan, taskId),
    });
  }
  return found;
}

/**
 * Suggest task IDs for a failed lookup.
 *
 * Tasks sharing the requested ID's phase prefix come first; otherwise the
 * open tasks of the working phases are listed.
 */
export function formatTaskSuggestions(plan: Plan, taskId?: string): string {
  const all = plan.phases.flatMap((phase) => phase.tasks.map((task) => ({ phase, task })));
  if (all.length === 0) {
    return 'No tasks yet. Add one with: pv add-task <phase> "<title>"';
  }

  const prefix = taskId?.split('.')[0];
  let pool = prefix ? all.filter(({ phase }) => phase.id === prefix) : [];
  if (pool.length === 0) {
    pool = all.filter(
      ({ phase, task }) => !isReservedPhase(phase) && task.status !== 'completed',
    );
  }
  if (pool.length === 0) pool = all;

  const lines = pool
    .slice(0, MAX_SUGGESTIONS)
    .map(({ task }) => `  ${task.id}: ${task.title}`);
  if (pool.length > MAX_SUGGESTIONS) {
    lines.push(`  ... and ${pool.length - MAX_SUGGESTIONS} more`);
  }
  return ['Available tasks:', ...lines].join('\n');
}

/**
 * Completed tasks, most recently completed first. Tasks without a
 * `completed_at` stamp sort last.
 */
export function getRecentlyCompleted(plan: Plan, count?: number): PhaseTask[] {
  const completed: PhaseTask[] = [];
  for (const phase of plan.phases) {
    for (const task of phase.tasks) {
      if (task.status === 'completed') completed.push({ phase, task });
    }
  }

  completed.sort((a, b) => {
    const aAt = a.task.tracking?.completed_at ?? '';
    const bAt = b.task.tracking?.completed_at ?? '';
    if (aAt === bAt) return 0;
    return aAt < bAt ? 1 : -1;
  });

  return count === undefined ? completed : completed.slice(0, count);
}
