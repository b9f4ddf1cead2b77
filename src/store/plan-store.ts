/**
 * Plan document persistence.
 *
 * load: read, parse, check against the bundled schema, add the reserved
 * phases every plan carries.
 * save: stamp `meta.updated_at`, sort phases, recompute progress, write
 * atomically as 2-space JSON with a trailing newline.
 */

import { readJsonRequired, isJsonObject } from './json.js';
import { atomicWriteJson } from './atomic.js';
import { assertPlan } from '../core/schema.js';
import { getLogger } from '../core/logger.js';
import {
  ensureSpecialPhases,
  isNumericPhaseId,
  recalculateProgress,
  reservedOrder,
} from '../core/phases/index.js';
import type { Phase, Plan, PlanSummary } from '../types/plan.js';

/** Current UTC time as ISO-8601 with a `Z` suffix. */
export function nowIso(): string {
  return new Date().toISOString();
}

function hasCompleteSummary(data: Record<string, unknown>): boolean {
  const summary = data['summary'];
  return isJsonObject(summary) &&
    ['total_phases', 'total_tasks', 'completed_tasks', 'overall_progress']
      .every((key) => typeof summary[key] === 'number');
}

const EMPTY_SUMMARY: PlanSummary = {
  total_phases: 0,
  total_tasks: 0,
  completed_tasks: 0,
  overall_progress: 0,
};

/**
 * Sort key for phases: numeric IDs ascending, then any other non-reserved
 * ID, then `bugs`, `ideas`, `deferred`.
 */
export function phaseSortKey(phase: Pick<Phase, 'id'>): [number, number] {
  if (isNumericPhaseId(phase.id)) return [0, Number.parseInt(phase.id, 10)];
  const reserved = reservedOrder(phase.id);
  if (reserved >= 0) return [2, reserved];
  return [1, 0];
}

/**
 * Sort phases in place. Stable, so unknown non-numeric phases keep their
 * relative order.
 */
export function sortPhases(plan: Plan): void {
  plan.phases.sort((a, b) => {
    const [groupA, orderA] = phaseSortKey(a);
    const [groupB, orderB] = phaseSortKey(b);
    return groupA - groupB || orderA - orderB;
  });
}

/**
 * Load a plan file.
 *
 * Throws NOT_FOUND when the file is missing, PARSE_ERROR for malformed JSON
 * and VALIDATION_ERROR when the document does not have the shape of a plan.
 * Format and pattern rules are left to `pv validate`.
 * A missing or partial `summary` is derived rather than rejected.
 */
export async function loadPlan(filePath: string): Promise<Plan> {
  const data = await readJsonRequired(filePath);

  let summaryDerived = false;
  if (isJsonObject(data) && !hasCompleteSummary(data)) {
    data['summary'] = { ...EMPTY_SUMMARY };
    summaryDerived = true;
  }

  const plan = assertPlan(data, filePath);
  if (summaryDerived) recalculateProgress(plan);

  const created = ensureSpecialPhases(plan);
  if (created.length > 0) {
    getLogger('store').debug({ filePath, created }, 'Added missing reserved phases');
  }
  return plan;
}

/** Prepare a plan for writing: stamp, sort, recompute progress. */
function finalizePlan(plan: Plan): Plan {
  plan.meta.updated_at = nowIso();
  sortPhases(plan);
  recalculateProgress(plan);
  return plan;
}

/**
 * Save a plan file.
 */
export async function savePlan(filePath: string, plan: Plan): Promise<void> {
  finalizePlan(plan);
  await atomicWriteJson(filePath, plan);
  getLogger('store').info(
    { filePath, phases: plan.summary.total_phases, tasks: plan.summary.total_tasks },
    'Plan saved',
  );
}
