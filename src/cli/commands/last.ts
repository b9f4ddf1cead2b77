/**
 * CLI last command - recently completed tasks.
 */

import { Command } from 'commander';
import { getRecentlyCompleted } from '../../core/tasks/index.js';
import { cliOutput } from '../renderers/index.js';
import { handleError, loadContextPlan, parseCount } from './shared.js';

const DEFAULT_COUNT = 5;

export function registerLastCommand(program: Command): void {
  program
    .command('last')
    .alias('l')
    .description('Show recently completed tasks, newest first')
    .option('-n, --count <n>', 'Number of tasks to show', parseCount, DEFAULT_COUNT)
    .action(async (opts: { count: number }) => {
      try {
        const plan = await loadContextPlan();
        const recent = getRecentlyCompleted(plan, opts.count).map(({ phase, task }) => ({
          id: task.id,
          title: task.title,
          phase_id: phase.id,
          phase_name: phase.name,
          completed_at: task.tracking?.completed_at ?? null,
          agent_type: task.agent_type ?? null,
        }));
        cliOutput('last', recent);
      } catch (err) {
        handleError(err);
      }
    });
}
