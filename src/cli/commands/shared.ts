/**
 * Helpers shared by the command modules: loading and saving the plan named
 * by --file, option parsers and error reporting.
 */

import { InvalidArgumentError } from 'commander';
import { PlanError } from '../../core/errors.js';
import { loadPlan, savePlan } from '../../store/plan-store.js';
import type { Plan } from '../../types/plan.js';
import { isDryRun } from '../format-context.js';
import { getPlanContext } from '../plan-context.js';
import { cliError } from '../renderers/index.js';

/** Load the plan for this invocation. */
export async function loadContextPlan(): Promise<Plan> {
  return loadPlan(getPlanContext().planPath);
}

/**
 * Save the plan for this invocation. Under --dry-run nothing is written.
 */
export async function commitPlan(plan: Plan): Promise<void> {
  if (isDryRun()) return;
  await savePlan(getPlanContext().planPath, plan);
}

/**
 * Report a PlanError in the resolved format and set the exit status.
 * Anything else is rethrown for the entry point to handle.
 */
export function handleError(err: unknown): void {
  if (err instanceof PlanError) {
    cliError(err);
    process.exitCode = err.code;
    return;
  }
  throw err;
}

/** Commander parser for a non-negative integer option value. */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

/** Commander parser for an integer option value of at least 1. */
export function parsePositive(value: string): number {
  const n = parseCount(value);
  if (n < 1) {
    throw new InvalidArgumentError('Expected an integer of at least 1.');
  }
  return n;
}
