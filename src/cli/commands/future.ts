/**
 * CLI future command - upcoming tasks grouped by readiness.
 */

import { Command } from 'commander';
import { classifyUpcoming } from '../../core/tasks/index.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView } from '../view-models.js';
import { handleError, loadContextPlan, parseCount } from './shared.js';

const DEFAULT_COUNT = 5;

export function registerFutureCommand(program: Command): void {
  program
    .command('future')
    .alias('f')
    .description('Show upcoming tasks: in progress, ready, waiting on dependencies, blocked')
    .option('-n, --count <n>', 'Number of tasks to show', parseCount, DEFAULT_COUNT)
    .option('-a, --all', 'Show every upcoming task')
    .action(async (opts: { count: number; all?: boolean }) => {
      try {
        const plan = await loadContextPlan();
        const upcoming = classifyUpcoming(plan).map(({ task, phase, actionable }) => ({
          ...toTaskView(phase, task),
          actionable,
        }));
        cliOutput('future', opts.all ? upcoming : upcoming.slice(0, opts.count));
      } catch (err) {
        handleError(err);
      }
    });
}
