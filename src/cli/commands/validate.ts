/**
 * CLI validate command - check the plan file against the bundled schema.
 */

import { Command } from 'commander';
import { checkPlanSchema } from '../../core/schema.js';
import { readJsonRequired } from '../../store/json.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getPlanContext } from '../plan-context.js';
import { cliOutput } from '../renderers/index.js';
import { handleError } from './shared.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .alias('v')
    .description('Validate the plan file against the plan schema')
    .action(async () => {
      try {
        const { planPath } = getPlanContext();
        const data = await readJsonRequired(planPath);
        const { valid, issues } = checkPlanSchema(data);
        cliOutput('validate', { valid, path: planPath, issues });
        if (!valid) process.exitCode = ExitCode.VALIDATION_ERROR;
      } catch (err) {
        handleError(err);
      }
    });
}
