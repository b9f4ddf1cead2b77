/**
 * CLI rm command - remove a task or a whole phase.
 */

import { Argument, Command } from 'commander';
import { removePhase } from '../../core/phases/index.js';
import { deleteTask } from '../../core/tasks/index.js';
import type { Plan } from '../../types/plan.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import type { RemoveView } from '../view-models.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

function remove(plan: Plan, type: string, id: string): RemoveView {
  if (type === 'phase') {
    const phase = removePhase(plan, id);
    return {
      type: 'phase',
      id: phase.id,
      title: phase.name,
      tasks_removed: phase.tasks.length,
      dry_run: isDryRun(),
    };
  }
  const { task } = deleteTask(plan, id);
  return { type: 'task', id: task.id, title: task.title, tasks_removed: 1, dry_run: isDryRun() };
}

export function registerRmCommand(program: Command): void {
  program
    .command('rm')
    .description('Remove a task, or a phase with all of its tasks')
    .addArgument(new Argument('<type>', 'What to remove').choices(['task', 'phase']))
    .argument('<id>', 'Task or phase ID')
    .action(async (type: string, id: string) => {
      try {
        const plan = await loadContextPlan();
        const removed = remove(plan, type, id);
        await commitPlan(plan);
        cliOutput('rm', removed);
      } catch (err) {
        handleError(err);
      }
    });
}
