/**
 * CLI move command - relocate a task to another phase.
 */

import { Command } from 'commander';
import { relocateTask } from '../../core/tasks/index.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

export function registerMoveCommand(program: Command): void {
  program
    .command('move <id> <phase>')
    .description('Move a task to another phase; it gets a new ID and loses its dependencies')
    .action(async (id: string, phaseId: string) => {
      try {
        const plan = await loadContextPlan();
        const { oldId, newId, fromPhase, toPhase } = relocateTask(plan, id, phaseId);
        await commitPlan(plan);
        cliOutput('move', {
          old_id: oldId,
          id: newId,
          from_phase: fromPhase.id,
          to_phase: toPhase.id,
          dry_run: isDryRun(),
        });
      } catch (err) {
        handleError(err);
      }
    });
}
