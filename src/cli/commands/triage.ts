/**
 * CLI defer / bug / idea commands - send a task to a reserved phase, or
 * capture free text there as a new task.
 */

import { Command } from 'commander';
import {
  captureIdea,
  deferTask,
  markAsBug,
  type TriageResult,
} from '../../core/tasks/index.js';
import type { Plan } from '../../types/plan.js';
import { isDryRun } from '../format-context.js';
import { cliOutput } from '../renderers/index.js';
import type { TriageView } from '../view-models.js';
import { commitPlan, handleError, loadContextPlan } from './shared.js';

function toTriageView(result: TriageResult): TriageView {
  const reason = result.task.tracking?.defer_reason;
  return {
    action: result.kind,
    id: result.task.id,
    old_id: result.kind === 'moved' ? result.oldId : null,
    title: result.task.title,
    phase_id: result.toPhase.id,
    defer_reason: typeof reason === 'string' ? reason : null,
    dry_run: isDryRun(),
  };
}

async function applyTriage(triage: (plan: Plan) => TriageResult): Promise<void> {
  const plan = await loadContextPlan();
  const result = triage(plan);
  await commitPlan(plan);
  cliOutput('triage', toTriageView(result));
}

export function registerTriageCommands(program: Command): void {
  program
    .command('defer <idOrTitle>')
    .description('Move a task to the deferred phase, or add a new deferred task')
    .option('-r, --reason <text>', 'Why the task is deferred')
    .action(async (idOrTitle: string, opts: { reason?: string }) => {
      try {
        await applyTriage((plan) => deferTask(plan, idOrTitle, opts.reason));
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command('bug <idOrTitle>')
    .description('Move a task to the bugs phase, or add a new bug')
    .action(async (idOrTitle: string) => {
      try {
        await applyTriage((plan) => markAsBug(plan, idOrTitle));
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command('idea <idOrTitle>')
    .description('Move a task to the ideas phase, or capture a new idea')
    .action(async (idOrTitle: string) => {
      try {
        await applyTriage((plan) => captureIdea(plan, idOrTitle));
      } catch (err) {
        handleError(err);
      }
    });
}
