/**
 * Task status transitions and field edits.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { isTaskStatus, TASK_STATUSES } from '../../store/status-registry.js';
import { validateTitle } from './add.js';
import { requireTask } from './find.js';
import type { Phase, Plan, Task, TaskStatus } from '../../types/plan.js';

/** Fields `pv set` can change. */
export const SETTABLE_FIELDS = ['status', 'agent', 'skill', 'title'] as const;
export type SettableField = typeof SETTABLE_FIELDS[number];

/** Value that clears `agent` or `skill`. */
export const CLEAR_VALUE = 'none';

/** Result of a status change or field edit. */
export interface UpdateTaskResult {
  task: Task;
  phase: Phase;
  field: SettableField;
  value: string | null;
}

/**
 * Validate a task status string.
 */
export function validateStatus(value: string): TaskStatus {
  if (!isTaskStatus(value)) {
    throw new PlanError(
      ExitCode.INVALID_INPUT,
      `Invalid status '${value}'. Use: ${TASK_STATUSES.join(', ')}`,
    );
  }
  return value;
}

function isSettableField(value: string): value is SettableField {
  return SETTABLE_FIELDS.some((f) => f === value);
}

/**
 * Apply a status to a task with its side effects.
 *
 * `in_progress` stamps `tracking.started_at`. `completed` stamps
 * `tracking.completed_at` and completes every subtask. Other statuses only
 * change the status field.
 */
export function applyStatus(task: Task, status: TaskStatus, now: string = new Date().toISOString()): void {
  task.status = status;
  if (status === 'in_progress') {
    task.tracking = { ...task.tracking, started_at: now };
  } else if (status === 'completed') {
    task.tracking = { ...task.tracking, completed_at: now };
    for (const subtask of task.subtasks ?? []) {
      subtask.status = 'completed';
    }
  }
}

/**
 * Set a task's status by ID.
 */
export function setTaskStatus(plan: Plan, taskId: string, status: TaskStatus): UpdateTaskResult {
  const { phase, task } = requireTask(plan, taskId);
  applyStatus(task, status);
  return { task, phase, field: 'status', value: status };
}

/**
 * Set one editable field on a task.
 *
 * `agent` and `skill` are cleared by the value `none`.
 */
export function setTaskField(plan: Plan, taskId: string, field: string, value: string): UpdateTaskResult {
  if (!isSettableField(field)) {
    throw new PlanError(
      ExitCode.INVALID_INPUT,
      `Unknown field '${field}'. Use: ${SETTABLE_FIELDS.join(', ')}`,
    );
  }

  switch (field) {
    case 'status':
      return setTaskStatus(plan, taskId, validateStatus(value));
    case 'title': {
      validateTitle(value);
      const { phase, task } = requireTask(plan, taskId);
      task.title = value;
      return { task, phase, field, value };
    }
    case 'agent': {
      const { phase, task } = requireTask(plan, taskId);
      task.agent_type = value === CLEAR_VALUE ? null : value;
      return { task, phase, field, value: task.agent_type };
    }
    case 'skill': {
      const { phase, task } = requireTask(plan, taskId);
      task.skill = value === CLEAR_VALUE ? null : value;
      return { task, phase, field, value: task.skill };
    }
  }
}
