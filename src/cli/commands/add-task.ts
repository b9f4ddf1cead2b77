/**
 * CLI add-task command.
 */

import { Command } from 'commander';
import { addTask, parseDependsList } from '../../core/tasks/index.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView } from '../view-models.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

interface AddTaskCliOptions {
  agent?: string;
  skill?: string;
  deps?: string;
}

export function registerAddTaskCommand(program: Command): void {
  program
    .command('add-task <phase> <title>')
    .description('Add a task to a phase under the next free ID')
    .option('--agent <type>', 'Agent type to assign')
    .option('--skill <name>', 'Skill to assign')
    .option('--deps <ids>', 'Comma-separated IDs of tasks this one depends on')
    .action(async (phaseId: string, title: string, opts: AddTaskCliOptions) => {
      try {
        const plan = await loadContextPlan();
        const { task, phase } = addTask(plan, {
          phaseId,
          title,
          agentType: opts.agent,
          skill: opts.skill,
          depends: parseDependsList(opts.deps),
        });
        await commitPlan(plan);
        cliOutput('add-task', { ...toTaskView(phase, task), dry_run: isDryRun() });
      } catch (err) {
        handleError(err);
      }
    });
}
