/**
 * Plan fixtures for engine and CLI tests.
 */

import { PlanError } from '../errors.js';
import type { Phase, Plan, Task } from '../../types/plan.js';

export const FIXED_TIME = '2024-01-01T00:00:00.000Z';

/** A pending task titled after its ID. */
export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    status: 'pending',
    agent_type: null,
    depends_on: [],
    tracking: {},
    ...overrides,
  };
}

/** A pending phase with zeroed progress. */
export function makePhase(id: string, tasks: Task[] = [], overrides: Partial<Phase> = {}): Phase {
  return {
    id,
    name: `Phase ${id}`,
    description: '',
    status: 'pending',
    progress: { completed: 0, total: 0, percentage: 0 },
    tasks,
    ...overrides,
  };
}

/** A plan with fixed timestamps and a zeroed summary. */
export function makePlan(phases: Phase[] = [], overrides: Partial<Plan> = {}): Plan {
  return {
    meta: {
      project: 'test-project',
      version: '1.0.0',
      created_at: FIXED_TIME,
      updated_at: FIXED_TIME,
      business_plan_path: '.claude/BUSINESS_PLAN.md',
    },
    summary: {
      total_phases: 0,
      total_tasks: 0,
      completed_tasks: 0,
      overall_progress: 0,
    },
    phases,
    ...overrides,
  };
}

/** Every task ID in the plan, in stored order. */
export function allTaskIds(plan: Plan): string[] {
  return plan.phases.flatMap((p) => p.tasks.map((t) => t.id));
}

/** Run `fn` and return the PlanError it throws; fails if it throws nothing. */
export function catchPlanError(fn: () => unknown): PlanError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PlanError) return err;
    throw err;
  }
  throw new Error('Expected a PlanError to be thrown');
}

/** Async form of catchPlanError. */
export async function rejectsWithPlanError(promise: Promise<unknown>): Promise<PlanError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof PlanError) return err;
    throw err;
  }
  throw new Error('Expected a PlanError to be thrown');
}
