/**
 * CLI get command - one task in detail.
 */

import { Command } from 'commander';
import { requireTask } from '../../core/tasks/index.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView } from '../view-models.js';
import { handleError, loadContextPlan } from './shared.js';

export function registerGetCommand(program: Command): void {
  program
    .command('get <id>')
    .alias('g')
    .description('Show a task by ID')
    .action(async (id: string) => {
      try {
        const plan = await loadContextPlan();
        const { phase, task } = requireTask(plan, id);
        cliOutput('get', toTaskView(phase, task));
      } catch (err) {
        handleError(err);
      }
    });
}
