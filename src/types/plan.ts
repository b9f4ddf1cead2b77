/**
 * Plan document type definitions matching plan.schema.json.
 */

import type { TaskStatus, PhaseStatus, ReservedPhaseId } from '../store/status-registry.js';
export type { TaskStatus, PhaseStatus, ReservedPhaseId };

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Task bookkeeping. Two well-known timestamps plus free-form extension keys
 * (defer_reason, notes, time_spent_minutes, ...).
 */
export interface TaskTracking {
  started_at?: string;
  completed_at?: string;
  [key: string]: JsonValue | undefined;
}

/** Minimal nested work item. */
export interface Subtask {
  id: string;
  title: string;
  status: TaskStatus;
}

/** A single task, identified as `<phase>.<section>.<n>`. */
export interface Task {
  id: string;
  title: string;
  status: TaskStatus;
  agent_type?: string | null;
  skill?: string | null;
  /** IDs of tasks in any phase; may reference IDs that do not exist. */
  depends_on?: string[];
  tracking?: TaskTracking;
  subtasks?: Subtask[];
}

/** Derived per-phase completion counters. */
export interface PhaseProgress {
  completed: number;
  total: number;
  percentage: number;
}

export interface Phase {
  /** Non-negative integer as string, or a reserved triage literal. */
  id: string;
  name: string;
  description: string;
  status: PhaseStatus;
  progress: PhaseProgress;
  tasks: Task[];
}

export interface PlanMeta {
  project: string;
  version: string;
  created_at: string;
  updated_at: string;
  business_plan_path: string;
}

/** Derived whole-plan completion counters. */
export interface PlanSummary {
  total_phases: number;
  total_tasks: number;
  completed_tasks: number;
  overall_progress: number;
}

/** Free-form decision record (question, options, recommended, decided, ...). */
export type DecisionRecord = { [key: string]: JsonValue };

export interface PlanDecisions {
  pending: DecisionRecord[];
  resolved: DecisionRecord[];
}

/** Free-form blocker record; `affects_tasks` lists the task IDs it holds up. */
export interface BlockerRecord {
  affects_tasks?: string[];
  [key: string]: JsonValue | undefined;
}

/** Root aggregate persisted as plan.json. */
export interface Plan {
  meta: PlanMeta;
  summary: PlanSummary;
  phases: Phase[];
  decisions?: PlanDecisions;
  blockers?: BlockerRecord[];
}

/** A task together with the phase that currently holds it. */
export interface PhaseTask {
  phase: Phase;
  task: Task;
}
