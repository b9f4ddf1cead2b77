/**
 * CLI default action - full plan overview.
 */

import { Command } from 'commander';
import { PlanError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput } from '../renderers/index.js';
import { handleError, loadContextPlan } from './shared.js';

/**
 * Make the overview the program's own action, run when no command is given.
 */
export function registerOverviewCommand(program: Command): void {
  program
    .action(async (_opts: Record<string, unknown>, command: Command) => {
      try {
        const [extra] = command.args;
        if (extra !== undefined) {
          throw new PlanError(ExitCode.INVALID_INPUT, `Unknown command '${extra}'`, {
            fix: 'Run: pv --help',
          });
        }
        const plan = await loadContextPlan();
        cliOutput('overview', plan);
      } catch (err) {
        handleError(err);
      }
    });
}
