/**
 * Per-invocation plan file and configuration.
 *
 * Resolved once in the preAction hook from --file and the layered config;
 * commands read it instead of re-resolving paths.
 */

import { DEFAULTS } from '../core/config.js';
import { resolvePlanPath } from '../core/paths.js';
import type { PlanViewConfig } from '../types/config.js';

export interface PlanContext {
  /** Absolute path of the plan file. */
  planPath: string;
  config: PlanViewConfig;
}

let currentContext: PlanContext | null = null;

export function setPlanContext(context: PlanContext): void {
  currentContext = context;
}

/**
 * Current plan context. Falls back to ./plan.json with default settings
 * when the hook has not run.
 */
export function getPlanContext(): PlanContext {
  return currentContext ?? { planPath: resolvePlanPath(), config: DEFAULTS };
}
