/**
 * CLI set command and the status shortcuts done / start / block / skip.
 */

import { Command } from 'commander';
import {
  setTaskField,
  setTaskStatus,
  SETTABLE_FIELDS,
  type UpdateTaskResult,
} from '../../core/tasks/index.js';
import type { Plan, TaskStatus } from '../../types/plan.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

async function applyEdit(edit: (plan: Plan) => UpdateTaskResult): Promise<void> {
  const plan = await loadContextPlan();
  const { task, field, value } = edit(plan);
  await commitPlan(plan);
  cliOutput('set', { id: task.id, field, value, dry_run: isDryRun() });
}

/** Shortcut commands and the status each one sets. */
const STATUS_SHORTCUTS: ReadonlyArray<{ name: string; status: TaskStatus; description: string }> = [
  { name: 'done', status: 'completed', description: 'Mark a task completed' },
  { name: 'start', status: 'in_progress', description: 'Mark a task in progress' },
  { name: 'block', status: 'blocked', description: 'Mark a task blocked' },
  { name: 'skip', status: 'skipped', description: 'Mark a task skipped' },
];

export function registerSetCommand(program: Command): void {
  program
    .command('set <id> <field> <value>')
    .description(`Set a task field (${SETTABLE_FIELDS.join(', ')}); "none" clears agent or skill`)
    .action(async (id: string, field: string, value: string) => {
      try {
        await applyEdit((plan) => setTaskField(plan, id, field, value));
      } catch (err) {
        handleError(err);
      }
    });

  for (const shortcut of STATUS_SHORTCUTS) {
    program
      .command(`${shortcut.name} <id>`)
      .description(shortcut.description)
      .action(async (id: string) => {
        try {
          await applyEdit((plan) => setTaskStatus(plan, id, shortcut.status));
        } catch (err) {
          handleError(err);
        }
      });
  }
}
