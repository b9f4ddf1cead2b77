/**
 * Phase management: lookup, creation, removal and the reserved triage phases.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { isReservedPhaseId, RESERVED_PHASE_IDS } from '../../store/status-registry.js';
import type { Phase, Plan, ReservedPhaseId } from '../../types/plan.js';

export { recalculateProgress, recalculatePhase } from './progress.js';

/** Fixed name and description for each reserved phase. */
export const RESERVED_PHASES: Record<ReservedPhaseId, { name: string; description: string }> = {
  bugs: { name: 'Bugs', description: 'Tasks identified as bugs requiring fixes' },
  ideas: { name: 'Ideas', description: 'Ideas and suggestions for future consideration' },
  deferred: { name: 'Deferred', description: 'Tasks postponed for later consideration' },
};

/** Reserved phases created on every load when absent. */
export const AUTO_CREATED_PHASE_IDS: readonly ReservedPhaseId[] = ['bugs', 'deferred'];

/** A phase with no tasks and zeroed progress. */
export function createPhase(id: string, name: string, description: string = ''): Phase {
  return {
    id,
    name,
    description,
    status: 'pending',
    progress: { completed: 0, total: 0, percentage: 0 },
    tasks: [],
  };
}

/** Find a phase by ID. */
export function findPhase(plan: Plan, phaseId: string): Phase | null {
  return plan.phases.find((p) => p.id === phaseId) ?? null;
}

/**
 * Find a phase, throwing NOT_FOUND with the available IDs when absent.
 */
export function requirePhase(plan: Plan, phaseId: string): Phase {
  const phase = findPhase(plan, phaseId);
  if (!phase) {
    throw new PlanError(ExitCode.NOT_FOUND, `Phase '${phaseId}' not found`, {
      fix: formatPhaseSuggestions(plan),
    });
  }
  return phase;
}

/** True when the phase ID is one of the reserved triage literals. */
export function isReservedPhase(phase: Phase): boolean {
  return isReservedPhaseId(phase.id);
}

/** True for a phase ID made only of digits. */
export function isNumericPhaseId(phaseId: string): boolean {
  return /^\d+$/.test(phaseId);
}

/**
 * Next numeric phase ID: one more than the current maximum, ignoring
 * reserved and other non-numeric IDs.
 */
export function allocatePhaseId(plan: Plan): string {
  let max = -1;
  for (const phase of plan.phases) {
    if (isNumericPhaseId(phase.id)) {
      max = Math.max(max, Number.parseInt(phase.id, 10));
    }
  }
  return String(max + 1);
}

/**
 * Return the reserved phase, creating and appending it first when absent.
 */
export function ensureReservedPhase(plan: Plan, phaseId: ReservedPhaseId): Phase {
  const existing = findPhase(plan, phaseId);
  if (existing) return existing;
  const { name, description } = RESERVED_PHASES[phaseId];
  const phase = createPhase(phaseId, name, description);
  plan.phases.push(phase);
  return phase;
}

/**
 * Add the reserved phases every loaded plan carries.
 * Returns the IDs that had to be created.
 */
export function ensureSpecialPhases(plan: Plan): ReservedPhaseId[] {
  const created: ReservedPhaseId[] = [];
  for (const id of AUTO_CREATED_PHASE_IDS) {
    if (!findPhase(plan, id)) {
      ensureReservedPhase(plan, id);
      created.push(id);
    }
  }
  return created;
}

/**
 * Append a new numbered phase.
 */
export function addPhase(plan: Plan, name: string, description?: string): Phase {
  const phase = createPhase(allocatePhaseId(plan), name, description ?? '');
  plan.phases.push(phase);
  return phase;
}

/**
 * Remove a phase and all of its tasks.
 */
export function removePhase(plan: Plan, phaseId: string): Phase {
  const phase = requirePhase(plan, phaseId);
  plan.phases = plan.phases.filter((p) => p !== phase);
  return phase;
}

/**
 * The phase being worked on: the first `in_progress` phase, else the first
 * `pending` one. Reserved phases are never current.
 */
export function getCurrentPhase(plan: Plan): Phase | null {
  const candidates = plan.phases.filter((p) => !isReservedPhase(p));
  return (
    candidates.find((p) => p.status === 'in_progress') ??
    candidates.find((p) => p.status === 'pending') ??
    null
  );
}

/** Sort position of a reserved ID, or -1. */
export function reservedOrder(phaseId: string): number {
  return RESERVED_PHASE_IDS.findIndex((id) => id === phaseId);
}

/**
 * One line per phase, used as the fix hint for phase lookups.
 */
export function formatPhaseSuggestions(plan: Plan): string {
  if (plan.phases.length === 0) {
    return 'No phases yet. Add one with: pv add-phase "<name>"';
  }
  const lines = plan.phases.map((p) => `  ${p.id}: ${p.name}`);
  return ['Available phases:', ...lines].join('\n');
}
