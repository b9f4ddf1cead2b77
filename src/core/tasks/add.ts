/**
 * Task creation.
 */

import { PlanError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { requirePhase } from '../phases/index.js';
import { allocateTaskId } from './id.js';
import type { Phase, Plan, Task } from '../../types/plan.js';

/** Options for creating a task. */
export interface AddTaskOptions {
  phaseId: string;
  title: string;
  agentType?: string;
  skill?: string;
  depends?: string[];
}

/** Result of adding a task. */
export interface AddTaskResult {
  task: Task;
  phase: Phase;
}

/**
 * Validate a task title.
 */
export function validateTitle(title: string): void {
  if (!title || title.trim().length === 0) {
    throw new PlanError(ExitCode.INVALID_INPUT, 'Task title is required');
  }
}

/**
 * Split a comma-separated dependency list, dropping empty entries.
 */
export function parseDependsList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((d) => d.trim())
    .filter((d) => d.length > 0);
}

/**
 * A fresh pending task with empty tracking and dependencies.
 */
export function createTask(id: string, title: string): Task {
  return {
    id,
    title,
    status: 'pending',
    agent_type: null,
    depends_on: [],
    tracking: {},
  };
}

/**
 * Append a new task to a phase under the next free ID.
 * Dependencies may name tasks that do not exist yet.
 */
export function addTask(plan: Plan, options: AddTaskOptions): AddTaskResult {
  validateTitle(options.title);
  const phase = requirePhase(plan, options.phaseId);

  const task = appendNewTask(phase, options.title);
  task.agent_type = options.agentType ?? null;
  if (options.skill) task.skill = options.skill;
  task.depends_on = [...(options.depends ?? [])];

  return { task, phase };
}

/**
 * Create a task directly in a phase that the caller already holds.
 */
export function appendNewTask(phase: Phase, title: string): Task {
  validateTitle(title);
  const task = createTask(allocateTaskId(phase), title);
  phase.tasks.push(task);
  return task;
}
