/**
 * CLI add-phase command.
 */

import { Command } from 'commander';
import { addPhase } from '../../core/phases/index.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

export function registerAddPhaseCommand(program: Command): void {
  program
    .command('add-phase <name>')
    .description('Append a numbered phase')
    .option('--desc <text>', 'Phase description', '')
    .action(async (name: string, opts: { desc: string }) => {
      try {
        const plan = await loadContextPlan();
        const phase = addPhase(plan, name, opts.desc);
        await commitPlan(plan);
        cliOutput('add-phase', {
          id: phase.id,
          name: phase.name,
          description: phase.description,
          dry_run: isDryRun(),
        });
      } catch (err) {
        handleError(err);
      }
    });
}
