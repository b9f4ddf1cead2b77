/**
 * Output shapes for CLI commands.
 *
 * Each command builds one of these from the plan; --json prints it as-is and
 * the human renderers format the same object.
 */

import type { SchemaIssue } from '../core/schema.js';
import type { BackupEntry } from '../store/backup.js';
import type {
  Phase,
  Plan,
  PlanSummary,
  Subtask,
  Task,
  TaskStatus,
  TaskTracking,
} from '../types/plan.js';

/** A task flattened together with its phase. */
export interface TaskView {
  id: string;
  title: string;
  status: TaskStatus;
  phase_id: string;
  phase_name: string;
  agent_type: string | null;
  skill: string | null;
  depends_on: string[];
  tracking: TaskTracking;
  subtasks?: Subtask[];
}

export interface PhaseRef {
  id: string;
  name: string;
}

export interface CurrentView {
  project: string;
  version: string;
  summary: PlanSummary;
  completed_phases: PhaseRef[];
  current_phase: Phase | null;
  next_task: TaskView | null;
}

export interface RecentView {
  id: string;
  title: string;
  phase_id: string;
  phase_name: string;
  completed_at: string | null;
  agent_type: string | null;
}

export interface UpcomingView extends TaskView {
  actionable: boolean;
}

export interface ValidateView {
  valid: boolean;
  path: string;
  issues: SchemaIssue[];
}

export interface InitView {
  path: string;
  project: string;
  dry_run: boolean;
}

export interface PhaseAddedView {
  id: string;
  name: string;
  description: string;
  dry_run: boolean;
}

export interface TaskAddedView extends TaskView {
  dry_run: boolean;
}

export interface FieldSetView {
  id: string;
  field: string;
  value: string | null;
  dry_run: boolean;
}

export interface TriageView {
  action: 'moved' | 'created';
  id: string;
  old_id: string | null;
  title: string;
  phase_id: string;
  defer_reason: string | null;
  dry_run: boolean;
}

export interface MoveView {
  old_id: string;
  id: string;
  from_phase: string;
  to_phase: string;
  dry_run: boolean;
}

export interface RemoveView {
  type: 'task' | 'phase';
  id: string;
  title: string;
  /** Tasks removed with a phase. */
  tasks_removed: number;
  dry_run: boolean;
}

export interface CompactView {
  compacted: number;
  backup: string | null;
  dry_run: boolean;
}

export interface RestoreView {
  number: number;
  from: string;
  to: string;
  /** Backup taken of the file that was replaced. */
  backup: string | null;
  dry_run: boolean;
}

/** Payload type of every command, keyed by renderer name. */
export interface ViewData {
  overview: Plan;
  current: CurrentView;
  next: TaskView | null;
  phase: Phase | null;
  get: TaskView;
  last: RecentView[];
  future: UpcomingView[];
  bugs: TaskView[];
  ideas: TaskView[];
  deferred: TaskView[];
  validate: ValidateView;
  init: InitView;
  'add-phase': PhaseAddedView;
  'add-task': TaskAddedView;
  set: FieldSetView;
  triage: TriageView;
  move: MoveView;
  rm: RemoveView;
  compact: CompactView;
  'backup-list': BackupEntry[];
  'backup-restore': RestoreView;
}

export type ViewName = keyof ViewData;

export function toTaskView(phase: Phase, task: Task): TaskView {
  return {
    id: task.id,
    title: task.title,
    status: task.status,
    phase_id: phase.id,
    phase_name: phase.name,
    agent_type: task.agent_type ?? null,
    skill: task.skill ?? null,
    depends_on: task.depends_on ?? [],
    tracking: task.tracking ?? {},
    ...(task.subtasks && { subtasks: task.subtasks }),
  };
}
