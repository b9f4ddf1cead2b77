/**
 * CLI bugs / ideas / deferred commands - list a reserved phase.
 */

import { Command } from 'commander';
import { findPhase } from '../../core/phases/index.js';
import type { ReservedPhaseId } from '../../types/plan.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView, type TaskView } from '../view-models.js';
import { handleError, loadContextPlan } from './shared.js';

async function listReserved(phaseId: ReservedPhaseId): Promise<TaskView[]> {
  const plan = await loadContextPlan();
  const phase = findPhase(plan, phaseId);
  return phase ? phase.tasks.map((task) => toTaskView(phase, task)) : [];
}

export function registerBucketCommands(program: Command): void {
  program
    .command('bugs')
    .alias('b')
    .description('List tasks in the bugs phase')
    .action(async () => {
      try {
        cliOutput('bugs', await listReserved('bugs'));
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command('ideas')
    .alias('i')
    .description('List tasks in the ideas phase')
    .action(async () => {
      try {
        cliOutput('ideas', await listReserved('ideas'));
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command('deferred')
    .alias('dfr')
    .description('List deferred tasks with their reasons')
    .action(async () => {
      try {
        cliOutput('deferred', await listReserved('deferred'));
      } catch (err) {
        handleError(err);
      }
    });
}
