/**
 * CLI current command - completed phases, the current phase and the next task.
 */

import { Command } from 'commander';
import { getCurrentPhase, isReservedPhase } from '../../core/phases/index.js';
import { getNextTask } from '../../core/tasks/index.js';
import type { Plan } from '../../types/plan.js';
import { cliOutput } from '../renderers/index.js';
import { toTaskView, type CurrentView } from '../view-models.js';
import { handleError, loadContextPlan } from './shared.js';

function buildCurrentView(plan: Plan): CurrentView {
  const next = getNextTask(plan);
  return {
    project: plan.meta.project,
    version: plan.meta.version,
    summary: plan.summary,
    completed_phases: plan.phases
      .filter((p) => !isReservedPhase(p) && p.status === 'completed')
      .map((p) => ({ id: p.id, name: p.name })),
    current_phase: getCurrentPhase(plan),
    next_task: next ? toTaskView(next.phase, next.task) : null,
  };
}

export function registerCurrentCommand(program: Command): void {
  program
    .command('current')
    .alias('c')
    .description('Show completed phases, the current phase and the next task')
    .action(async () => {
      try {
        const plan = await loadContextPlan();
        cliOutput('current', buildCurrentView(plan));
      } catch (err) {
        handleError(err);
      }
    });
}
