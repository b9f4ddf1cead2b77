/**
 * CLI init command - create a new plan file.
 */

import { Command } from 'commander';
import { initPlan } from '../../core/init.js';
import { isDryRun } from '../format-context.js';
import { getPlanContext } from '../plan-context.js';
import { cliOutput } from '../renderers/index.js';
import { commitPlan, handleError } from './shared.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init <name>')
    .description('Create a new plan file for a project')
    .option('--force', 'Overwrite an existing plan file')
    .action(async (name: string, opts: { force?: boolean }) => {
      try {
        const { planPath } = getPlanContext();
        const plan = await initPlan(planPath, { name, force: opts.force === true });
        await commitPlan(plan);
        cliOutput('init', { path: planPath, project: plan.meta.project, dry_run: isDryRun() });
      } catch (err) {
        handleError(err);
      }
    });
}
