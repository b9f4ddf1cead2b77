/**
 * Human-readable renderers for the plan view commands.
 *
 * Covers: overview, current, next, phase, get, last, future, bugs, ideas,
 * deferred, validate.
 */

import { RESERVED_PHASES } from '../../core/phases/index.js';
import type { Phase, Plan, ReservedPhaseId, Task } from '../../types/plan.js';
import type {
  CurrentView,
  RecentView,
  TaskView,
  UpcomingView,
  ValidateView,
} from '../view-models.js';
import {
  BOLD, DIM, NC, GREEN, YELLOW, CYAN, RED,
  statusSymbol, statusColor, readinessSymbol, shortDate, pct,
  type Readiness,
} from './colors.js';

function agentLabel(agent: string | null | undefined, fallback: string): string {
  return agent || fallback;
}

function taskLine(task: Pick<Task, 'id' | 'title' | 'status' | 'agent_type'>): string {
  return `   ${statusColor(task.status)}${statusSymbol(task.status)}${NC} [${task.id}] ${task.title} ${DIM}(${agentLabel(task.agent_type, 'general')})${NC}`;
}

function header(project: string, version: string, completed: number, total: number, progress: number): string[] {
  return [
    `${BOLD}${project} v${version}${NC}`,
    `Progress: ${pct(progress)} (${completed}/${total} tasks)`,
    '',
  ];
}

// ---------------------------------------------------------------------------
// overview: every phase and task
// ---------------------------------------------------------------------------

export function renderOverview(plan: Plan, quiet: boolean): string {
  const { summary, meta } = plan;
  if (quiet) return `${summary.completed_tasks}/${summary.total_tasks}`;

  const lines = header(meta.project, meta.version, summary.completed_tasks, summary.total_tasks, summary.overall_progress);
  for (const phase of plan.phases) {
    lines.push(`${statusSymbol(phase.status)} ${BOLD}Phase ${phase.id}: ${phase.name}${NC} (${pct(phase.progress.percentage)})`);
    if (phase.description) lines.push(`   ${phase.description}`);
    for (const task of phase.tasks) lines.push(taskLine(task));
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

// ---------------------------------------------------------------------------
// current: completed phases, current phase, next task
// ---------------------------------------------------------------------------

export function renderCurrent(data: CurrentView, quiet: boolean): string {
  if (quiet) return data.next_task?.id ?? '';

  const { summary } = data;
  const lines = header(data.project, data.version, summary.completed_tasks, summary.total_tasks, summary.overall_progress);

  for (const phase of data.completed_phases) {
    lines.push(`${GREEN}${statusSymbol('completed')} Phase ${phase.id}: ${phase.name} (100%)${NC}`);
  }

  const current = data.current_phase;
  if (current) {
    if (data.completed_phases.length > 0) lines.push('');
    lines.push(`${statusSymbol(current.status)} ${BOLD}${YELLOW}Phase ${current.id}: ${current.name} (${pct(current.progress.percentage)})${NC}`);
    if (current.description) lines.push(`   ${current.description}`);
    for (const task of current.tasks) lines.push(taskLine(task));
  }

  if (data.next_task) {
    lines.push('');
    lines.push(`${BOLD}Next:${NC} [${data.next_task.id}] ${data.next_task.title}`);
  }
  return lines.join('\n').trimEnd();
}

// ---------------------------------------------------------------------------
// next / get: a single task
// ---------------------------------------------------------------------------

export function renderNext(task: TaskView | null, quiet: boolean): string {
  if (!task) return quiet ? '' : 'No pending tasks found!';
  if (quiet) return task.id;

  const lines = [
    `${BOLD}Next Task:${NC}`,
    `  ${statusSymbol(task.status)} [${task.id}] ${task.title}`,
    `  ${DIM}Phase:${NC} ${task.phase_name}`,
    `  ${DIM}Agent:${NC} ${agentLabel(task.agent_type, 'general-purpose')}`,
  ];
  if (task.skill) lines.push(`  ${DIM}Skill:${NC} ${task.skill}`);
  if (task.depends_on.length > 0) lines.push(`  ${DIM}Depends on:${NC} ${task.depends_on.join(', ')}`);
  return lines.join('\n');
}

export function renderGet(task: TaskView, quiet: boolean): string {
  if (quiet) return task.status;

  const lines = [
    `${BOLD}[${task.id}] ${task.title}${NC}`,
    `  ${DIM}Status:${NC} ${statusSymbol(task.status)} ${task.status}`,
    `  ${DIM}Phase:${NC} ${task.phase_name}`,
    `  ${DIM}Agent:${NC} ${agentLabel(task.agent_type, 'general-purpose')}`,
  ];
  if (task.skill) lines.push(`  ${DIM}Skill:${NC} ${task.skill}`);
  if (task.depends_on.length > 0) lines.push(`  ${DIM}Depends on:${NC} ${task.depends_on.join(', ')}`);

  const { started_at, completed_at, defer_reason } = task.tracking;
  if (started_at) lines.push(`  ${DIM}Started:${NC} ${shortDate(started_at)}`);
  if (completed_at) lines.push(`  ${DIM}Completed:${NC} ${shortDate(completed_at)}`);
  if (typeof defer_reason === 'string') lines.push(`  ${DIM}Defer reason:${NC} ${defer_reason}`);

  for (const subtask of task.subtasks ?? []) {
    lines.push(`    ${statusSymbol(subtask.status)} [${subtask.id}] ${subtask.title}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// phase: current phase with dependencies
// ---------------------------------------------------------------------------

export function renderPhase(phase: Phase | null, quiet: boolean): string {
  if (!phase) return quiet ? '' : 'No active phase found!';
  if (quiet) return phase.id;

  const { completed, total, percentage } = phase.progress;
  const lines = [
    `${BOLD}${CYAN}Phase ${phase.id}: ${phase.name}${NC}`,
  ];
  if (phase.description) lines.push(`   ${phase.description}`);
  lines.push(`   Progress: ${pct(percentage)} (${completed}/${total} tasks)`, '');

  for (const task of phase.tasks) {
    const agent = task.agent_type ? ` ${DIM}(${task.agent_type})${NC}` : '';
    const deps = task.depends_on && task.depends_on.length > 0
      ? ` ${DIM}[deps: ${task.depends_on.join(', ')}]${NC}`
      : '';
    lines.push(`   ${statusSymbol(task.status)} [${task.id}] ${task.title}${agent}${deps}`);
  }
  return lines.join('\n').trimEnd();
}

// ---------------------------------------------------------------------------
// last: recently completed
// ---------------------------------------------------------------------------

export function renderLast(entries: RecentView[], quiet: boolean): string {
  if (quiet) return entries.map((e) => e.id).join('\n');
  if (entries.length === 0) return 'No completed tasks found!';

  const lines = [`${BOLD}Recently Completed:${NC}`, ''];
  for (const entry of entries) {
    const when = shortDate(entry.completed_at) || 'unknown';
    lines.push(`   ${statusSymbol('completed')} [${entry.id}] ${entry.title}`);
    lines.push(`      ${DIM}${entry.phase_name} - ${when}${NC}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// future: upcoming tasks by readiness
// ---------------------------------------------------------------------------

function readinessOf(entry: UpcomingView): Readiness {
  if (entry.status === 'in_progress') return 'active';
  if (entry.status === 'blocked') return 'blocked';
  return entry.actionable ? 'ready' : 'waiting';
}

const READINESS_LABEL: Record<Readiness, string> = {
  active: 'in progress',
  ready: 'ready',
  waiting: 'waiting',
  blocked: 'blocked',
};

export function renderFuture(entries: UpcomingView[], quiet: boolean): string {
  if (quiet) return entries.map((e) => e.id).join('\n');
  if (entries.length === 0) return 'No upcoming tasks found!';

  const lines = [`${BOLD}Upcoming Tasks:${NC}`, ''];
  for (const entry of entries) {
    const readiness = readinessOf(entry);
    const color = readiness === 'blocked' ? RED : readiness === 'ready' ? GREEN : '';
    lines.push(`   ${readinessSymbol(readiness)} [${entry.id}] ${entry.title} ${color}${READINESS_LABEL[readiness]}${color ? NC : ''}`);
    const waitingOn = readiness === 'waiting' && entry.depends_on.length > 0
      ? ` - waiting on ${entry.depends_on.join(', ')}`
      : '';
    lines.push(`      ${DIM}${entry.phase_name}${waitingOn}${NC}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// bugs / ideas / deferred
// ---------------------------------------------------------------------------

function renderBucket(phaseId: ReservedPhaseId, tasks: TaskView[], quiet: boolean): string {
  if (quiet) return tasks.map((t) => t.id).join('\n');
  const { name } = RESERVED_PHASES[phaseId];
  if (tasks.length === 0) return `No ${name.toLowerCase()} found!`;

  const lines = [`${BOLD}${name}:${NC}`, ''];
  for (const task of tasks) {
    lines.push(`   ${statusSymbol(task.status)} [${task.id}] ${task.title}`);
    const reason = task.tracking.defer_reason;
    if (typeof reason === 'string') lines.push(`      ${DIM}Reason:${NC} ${reason}`);
  }
  return lines.join('\n');
}

export function renderBugs(tasks: TaskView[], quiet: boolean): string {
  return renderBucket('bugs', tasks, quiet);
}

export function renderIdeas(tasks: TaskView[], quiet: boolean): string {
  return renderBucket('ideas', tasks, quiet);
}

export function renderDeferred(tasks: TaskView[], quiet: boolean): string {
  return renderBucket('deferred', tasks, quiet);
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

export function renderValidate(data: ValidateView, quiet: boolean): string {
  if (quiet) return data.valid ? 'valid' : 'invalid';
  if (data.valid) return `${GREEN}${statusSymbol('completed')}${NC} ${data.path} is valid`;

  const lines = [`${RED}Validation failed for ${data.path}:${NC}`];
  for (const issue of data.issues) {
    lines.push(`   ${issue.message}`);
    if (issue.path) lines.push(`   ${DIM}Path:${NC} ${issue.path}`);
  }
  return lines.join('\n');
}
