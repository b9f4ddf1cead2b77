/**
 * Plan initialization: create a new plan document.
 */

import { access } from 'node:fs/promises';
import { PlanError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { nowIso } from '../store/plan-store.js';
import type { Plan } from '../types/plan.js';

export const INITIAL_VERSION = '1.0.0';
export const DEFAULT_BUSINESS_PLAN_PATH = '.claude/BUSINESS_PLAN.md';

export interface InitOptions {
  /** Project name recorded in `meta.project`. */
  name: string;
  /** Overwrite an existing plan file. */
  force?: boolean;
}

/**
 * Build an empty plan for a project.
 */
export function createPlan(name: string): Plan {
  const now = nowIso();
  return {
    meta: {
      project: name,
      version: INITIAL_VERSION,
      created_at: now,
      updated_at: now,
      business_plan_path: DEFAULT_BUSINESS_PLAN_PATH,
    },
    summary: {
      total_phases: 0,
      total_tasks: 0,
      completed_tasks: 0,
      overall_progress: 0,
    },
    phases: [],
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create the plan for `pv init`, refusing to replace an existing file unless
 * forced. The caller saves it.
 */
export async function initPlan(filePath: string, options: InitOptions): Promise<Plan> {
  if (options.name.trim().length === 0) {
    throw new PlanError(ExitCode.INVALID_INPUT, 'Project name is required');
  }
  if (!options.force && await exists(filePath)) {
    throw new PlanError(
      ExitCode.ALREADY_EXISTS,
      `${filePath} already exists`,
      { fix: 'Use --force to overwrite' },
    );
  }
  return createPlan(options.name);
}
