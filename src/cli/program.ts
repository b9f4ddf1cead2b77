/**
 * pv program definition: global options, hooks and command registration.
 *
 * Kept apart from the entry point so tests can build a fresh program and
 * drive it with parseAsync.
 */

import { Command, type ParseOptions } from 'commander';
import { readFileSync } from 'node:fs';
import { loadConfig } from '../core/config.js';
import { initLogger } from '../core/logger.js';
import { toPlanError } from '../core/output.js';
import { getStateDir, resolvePlanPath } from '../core/paths.js';
import { isJsonObject, parseJson } from '../store/json.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { setPlanContext } from './plan-context.js';
import { cliError } from './renderers/index.js';

import { registerOverviewCommand } from './commands/overview.js';
import { registerCurrentCommand } from './commands/current.js';
import { registerNextCommand } from './commands/next.js';
import { registerPhaseCommand } from './commands/phase.js';
import { registerGetCommand } from './commands/get.js';
import { registerLastCommand } from './commands/last.js';
import { registerFutureCommand } from './commands/future.js';
import { registerBucketCommands } from './commands/buckets.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerInitCommand } from './commands/init.js';
import { registerAddPhaseCommand } from './commands/add-phase.js';
import { registerAddTaskCommand } from './commands/add-task.js';
import { registerSetCommand } from './commands/set.js';
import { registerTriageCommands } from './commands/triage.js';
import { registerMoveCommand } from './commands/move.js';
import { registerRmCommand } from './commands/rm.js';
import { registerCompactCommand } from './commands/compact.js';
import { registerBackupCommand } from './commands/backup.js';

/** Read version from package.json (same relative path from src/ and dist/). */
function getPackageVersion(): string {
  try {
    const pkgUrl = new URL('../../package.json', import.meta.url);
    const pkg = parseJson(readFileSync(pkgUrl, 'utf8'), pkgUrl.pathname);
    return isJsonObject(pkg) && typeof pkg['version'] === 'string' ? pkg['version'] : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pv')
    .description('Track phased project plans and find the next task to work on')
    .version(getPackageVersion())
    .option('-f, --file <path>', 'Plan file (default: plan.json, or $PV_FILE)')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Suppress non-essential output for scripting')
    .option('-d, --dry-run', 'Show what an edit would do without saving');

  // Views
  registerOverviewCommand(program);
  registerCurrentCommand(program);
  registerNextCommand(program);
  registerPhaseCommand(program);
  registerGetCommand(program);
  registerLastCommand(program);
  registerFutureCommand(program);
  registerBucketCommands(program);
  registerValidateCommand(program);

  // Edits
  registerInitCommand(program);
  registerAddPhaseCommand(program);
  registerAddTaskCommand(program);
  registerSetCommand(program);
  registerTriageCommands(program);
  registerMoveCommand(program);
  registerRmCommand(program);
  registerCompactCommand(program);
  registerBackupCommand(program);

  // Resolve the plan file, config, output format and logger before any command.
  // The format is set from flags first so a config error is still reported
  // in the requested format.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setFormatContext(resolveFormat(opts));

    const file = opts['file'];
    const planPath = resolvePlanPath(typeof file === 'string' ? file : undefined);
    const config = await loadConfig(planPath);

    setPlanContext({ planPath, config });
    setFormatContext(resolveFormat(opts, config.output.defaultFormat));

    if (config.logging.level !== 'silent') {
      initLogger(getStateDir(planPath), config.logging);
    }
  });

  return program;
}

/**
 * Parse and run one invocation. Errors that escape a command (a bad config
 * file, say) are reported like command errors and set the exit status.
 */
export async function runCli(argv: string[], options?: ParseOptions): Promise<void> {
  try {
    await createProgram().parseAsync(argv, options);
  } catch (err) {
    const error = toPlanError(err);
    cliError(error);
    process.exitCode = error.code;
  }
}
