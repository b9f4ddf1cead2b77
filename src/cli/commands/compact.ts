/**
 * CLI compact command - strip completed tasks down to their ID, title,
 * status and completion time, after backing up the plan file.
 */

import { Command } from 'commander';
import { basename } from 'node:path';
import { getBackupDir } from '../../core/paths.js';
import { getLogger } from '../../core/logger.js';
import { compactPlan, countCompactable } from '../../core/tasks/index.js';
import { createBackup } from '../../store/backup.js';
import { savePlan } from '../../store/plan-store.js';
import { isDryRun } from '../format-context.js';
import { getPlanContext } from '../plan-context.js';
import { cliOutput } from '../renderers/index.js';
import { handleError, loadContextPlan, parsePositive } from './shared.js';

export function registerCompactCommand(program: Command): void {
  program
    .command('compact')
    .description('Compact completed tasks (a numbered backup is taken first)')
    .option('--max-backups <n>', 'Number of backups to keep', parsePositive)
    .action(async (opts: { maxBackups?: number }) => {
      try {
        const { planPath, config } = getPlanContext();
        const plan = await loadContextPlan();

        if (isDryRun()) {
          cliOutput('compact', { compacted: countCompactable(plan), backup: null, dry_run: true });
          return;
        }

        const compacted = compactPlan(plan);
        let backup: string | null = null;
        if (compacted > 0) {
          const maxBackups = opts.maxBackups ?? config.backup.maxBackups;
          backup = await createBackup(planPath, getBackupDir(planPath, config.backup.dir), maxBackups);
          await savePlan(planPath, plan);
          getLogger('compact').info({ compacted, backup, file: basename(planPath) }, 'Plan compacted');
        }
        cliOutput('compact', { compacted, backup, dry_run: false });
      } catch (err) {
        handleError(err);
      }
    });
}
