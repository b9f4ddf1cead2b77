/**
 * CLI phase command - the current phase with its tasks and dependencies.
 */

import { Command } from 'commander';
import { getCurrentPhase } from '../../core/phases/index.js';
import { cliOutput } from '../renderers/index.js';
import { handleError, loadContextPlan } from './shared.js';

export function registerPhaseCommand(program: Command): void {
  program
    .command('phase')
    .alias('p')
    .description('Show the current phase with task dependencies')
    .action(async () => {
      try {
        const plan = await loadContextPlan();
        cliOutput('phase', getCurrentPhase(plan));
      } catch (err) {
        handleError(err);
      }
    });
}
