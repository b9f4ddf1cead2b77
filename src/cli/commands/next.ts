/**
 * CLI next command - the task to work on next.
 */

import { Command } from 'commander';
import { getNextTask } from '../../core/tasks/index.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView } from '../view-models.js';
import { handleError, loadContextPlan } from './shared.js';

export function registerNextCommand(program: Command): void {
  program
    .command('next')
    .alias('n')
    .description('Show the next task: in progress, or pending with its dependencies done')
    .action(async () => {
      try {
        const plan = await loadContextPlan();
        const next = getNextTask(plan);
        cliOutput('next', next ? toTaskView(next.phase, next.task) : null);
      } catch (err) {
        handleError(err);
      }
    });
}
