/**
 * Human-readable renderers for commands that change the plan.
 *
 * Edits print a one-line confirmation, or `Would: ...` under --dry-run.
 * In quiet mode only the affected ID is printed.
 */

import type { BackupEntry } from '../../store/backup.js';
import type {
  CompactView,
  FieldSetView,
  InitView,
  MoveView,
  PhaseAddedView,
  RemoveView,
  RestoreView,
  TaskAddedView,
  TriageView,
} from '../view-models.js';
import { DIM, GREEN, NC, statusSymbol } from './colors.js';

function confirm(text: string, dryRun: boolean): string {
  if (dryRun) return `Would: ${text}`;
  return `${GREEN}${statusSymbol('completed')}${NC} ${text}`;
}

export function renderInit(data: InitView, quiet: boolean): string {
  if (quiet) return '';
  return confirm(`Initialize ${data.path} for ${data.project}`, data.dry_run);
}

export function renderAddPhase(data: PhaseAddedView, quiet: boolean): string {
  if (quiet) return data.id;
  return confirm(`Added Phase ${data.id}: ${data.name}`, data.dry_run);
}

export function renderAddTask(data: TaskAddedView, quiet: boolean): string {
  if (quiet) return data.id;
  const deps = data.depends_on.length > 0 ? ` ${DIM}(depends on ${data.depends_on.join(', ')})${NC}` : '';
  return confirm(`Added [${data.id}] ${data.title}`, data.dry_run) + deps;
}

export function renderSet(data: FieldSetView, quiet: boolean): string {
  if (quiet) return data.id;
  return confirm(`[${data.id}] ${data.field} → ${data.value ?? 'none'}`, data.dry_run);
}

export function renderTriage(data: TriageView, quiet: boolean): string {
  if (quiet) return data.id;
  const text = data.action === 'moved'
    ? `[${data.old_id}] → [${data.id}] (${data.phase_id})`
    : `Added [${data.id}] ${data.title} (${data.phase_id})`;
  const lines = [confirm(text, data.dry_run)];
  if (data.defer_reason) lines.push(`   ${DIM}Reason:${NC} ${data.defer_reason}`);
  return lines.join('\n');
}

export function renderMove(data: MoveView, quiet: boolean): string {
  if (quiet) return data.id;
  return confirm(`[${data.old_id}] → [${data.id}] (phase ${data.to_phase})`, data.dry_run);
}

export function renderRemove(data: RemoveView, quiet: boolean): string {
  if (quiet) return data.id;
  if (data.type === 'task') {
    return confirm(`Removed task [${data.id}] ${data.title}`, data.dry_run);
  }
  const count = data.tasks_removed === 1 ? '1 task' : `${data.tasks_removed} tasks`;
  return confirm(`Removed phase ${data.id}: ${data.title} (${count})`, data.dry_run);
}

export function renderCompact(data: CompactView, quiet: boolean): string {
  if (quiet) return String(data.compacted);
  if (data.compacted === 0) return 'Nothing to compact';
  const lines = [confirm(`Compacted ${data.compacted} completed task(s)`, data.dry_run)];
  if (data.backup) lines.push(`   ${DIM}Backed up to ${data.backup}${NC}`);
  return lines.join('\n');
}

export function renderBackupList(entries: BackupEntry[], quiet: boolean): string {
  if (quiet) return entries.map((e) => String(e.number)).join('\n');
  if (entries.length === 0) return 'No backups found!';
  return entries.map((e) => `   ${e.number}  ${e.path}`).join('\n');
}

export function renderRestore(data: RestoreView, quiet: boolean): string {
  if (quiet) return String(data.number);
  const lines = [confirm(`Restored ${data.to} from backup ${data.number}`, data.dry_run)];
  if (data.backup) lines.push(`   ${DIM}Previous file backed up to ${data.backup}${NC}`);
  return lines.join('\n');
}
