/**
 * CLI backup command - list and restore numbered plan backups.
 */

import { Command } from 'commander';
import { basename } from 'node:path';
import { getBackupDir } from '../../core/paths.js';
import { listBackups, restoreFromBackup, selectBackup } from '../../store/backup.js';
import { isDryRun } from '../format-context.js';
import { getPlanContext } from '../plan-context.js';
import { cliOutput } from '../renderers/index.js';
import { handleError, parsePositive } from './shared.js';

function backupLocation(): { planPath: string; fileName: string; backupDir: string; maxBackups: number } {
  const { planPath, config } = getPlanContext();
  return {
    planPath,
    fileName: basename(planPath),
    backupDir: getBackupDir(planPath, config.backup.dir),
    maxBackups: config.backup.maxBackups,
  };
}

export function registerBackupCommand(program: Command): void {
  const backup = program
    .command('backup')
    .description('List or restore numbered backups of the plan file');

  backup
    .command('list')
    .description('List backups, newest first')
    .action(async () => {
      try {
        const { fileName, backupDir } = backupLocation();
        cliOutput('backup-list', await listBackups(fileName, backupDir));
      } catch (err) {
        handleError(err);
      }
    });

  backup
    .command('restore')
    .description('Restore the plan file from a backup (the current file is backed up first)')
    .argument('[n]', 'Backup number (default: the newest)', parsePositive)
    .action(async (number: number | undefined) => {
      try {
        const { planPath, fileName, backupDir, maxBackups } = backupLocation();

        const { restored, backup } = isDryRun()
          ? { restored: selectBackup(await listBackups(fileName, backupDir), fileName, number), backup: null }
          : await restoreFromBackup(fileName, backupDir, planPath, number, maxBackups);

        cliOutput('backup-restore', {
          number: restored.number,
          from: restored.path,
          to: planPath,
          backup,
          dry_run: isDryRun(),
        });
      } catch (err) {
        handleError(err);
      }
    });
}
