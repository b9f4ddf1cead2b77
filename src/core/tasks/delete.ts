/**
 * Task removal.
 */

import { requireTask } from './find.js';
import type { PhaseTask, Plan } from '../../types/plan.js';

/**
 * Remove a task from its phase.
 *
 * Other tasks' `depends_on` entries naming it are left as they are and stay
 * unmet from then on.
 */
export function deleteTask(plan: Plan, taskId: string): PhaseTask {
  const found = requireTask(plan, taskId);
  found.phase.tasks = found.phase.tasks.filter((t) => t !== found.task);
  return found;
}
