/**
 * Hierarchical task ID allocation: `<phase>.<section>.<n>`.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Phase } from '../../types/plan.js';

/** Parsed form of a well-formed task ID. */
export interface TaskIdParts {
  phase: string;
  section: number;
  n: number;
}

function parseNumeral(part: string, id: string): number {
  if (!/^\d+$/.test(part)) {
    throw new PlanError(
      ExitCode.INVALID_IDENTIFIER,
      `Invalid task ID "${id}": "${part}" is not a number`,
      { fix: 'Task IDs look like <phase>.<section>.<n>, e.g. 0.1.2' },
    );
  }
  return Number.parseInt(part, 10);
}

/**
 * Split a task ID into its parts.
 *
 * Returns null for an ID with fewer than three dot-separated parts. Throws
 * INVALID_IDENTIFIER when the section or task number is not numeric.
 */
export function parseTaskId(id: string): TaskIdParts | null {
  const parts = id.split('.');
  if (parts.length < 3) return null;
  const [phase = '', sectionPart = '', nPart = ''] = parts;
  return {
    phase,
    section: parseNumeral(sectionPart, id),
    n: parseNumeral(nPart, id),
  };
}

/**
 * Next free task ID in a phase.
 *
 * The increment always happens in the highest-numbered section, after its
 * highest task number. IDs with fewer than three parts are ignored; if every
 * ID is ignored the result is `<phase>.0.1`.
 */
export function allocateTaskId(phase: Phase): string {
  if (phase.tasks.length === 0) {
    return `${phase.id}.1.1`;
  }

  let maxSection = 0;
  let maxN = 0;
  for (const task of phase.tasks) {
    const parsed = parseTaskId(task.id);
    if (!parsed) continue;
    if (
      parsed.section > maxSection ||
      (parsed.section === maxSection && parsed.n > maxN)
    ) {
      maxSection = parsed.section;
      maxN = parsed.n;
    }
  }

  return `${phase.id}.${maxSection}.${maxN + 1}`;
}
