/**
 * Central output dispatch for CLI commands.
 *
 * Commands call `cliOutput(command, data)`; the resolved format decides
 * whether the payload is printed as JSON or handed to the human renderer
 * registered for that command.
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { PlanError } from '../../core/errors.js';
import type { ViewData, ViewName } from '../view-models.js';
import { RED, NC, DIM } from './colors.js';

import {
  renderOverview, renderCurrent, renderNext, renderPhase, renderGet,
  renderLast, renderFuture, renderBugs, renderIdeas, renderDeferred,
  renderValidate,
} from './views.js';

import {
  renderInit, renderAddPhase, renderAddTask, renderSet, renderTriage,
  renderMove, renderRemove, renderCompact, renderBackupList, renderRestore,
} from './edits.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to human renderer function
// ---------------------------------------------------------------------------

type HumanRenderer<K extends ViewName> = (data: ViewData[K], quiet: boolean) => string;

const renderers: { [K in ViewName]: HumanRenderer<K> } = {
  // Views
  'overview': renderOverview,
  'current': renderCurrent,
  'next': renderNext,
  'phase': renderPhase,
  'get': renderGet,
  'last': renderLast,
  'future': renderFuture,
  'bugs': renderBugs,
  'ideas': renderIdeas,
  'deferred': renderDeferred,
  'validate': renderValidate,

  // Edits
  'init': renderInit,
  'add-phase': renderAddPhase,
  'add-task': renderAddTask,
  'set': renderSet,
  'triage': renderTriage,
  'move': renderMove,
  'rm': renderRemove,
  'compact': renderCompact,
  'backup-list': renderBackupList,
  'backup-restore': renderRestore,
};

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/**
 * Print a command result to stdout in the resolved format.
 * Human renderers may return an empty string to print nothing.
 */
export function cliOutput<K extends ViewName>(command: K, data: ViewData[K]): void {
  const ctx = getFormatContext();

  if (ctx.format === 'json') {
    console.log(formatSuccess(data));
    return;
  }

  const render: HumanRenderer<K> = renderers[command];
  const text = render(data, ctx.quiet);
  if (text) {
    console.log(text);
  }
}

/**
 * Print an error to stderr in the resolved format.
 * Human output is the message followed by the fix hint, when there is one.
 */
export function cliError(err: PlanError): void {
  const ctx = getFormatContext();

  if (ctx.format === 'json') {
    console.error(formatError(err));
    return;
  }

  console.error(`${RED}Error:${NC} ${err.message}`);
  if (err.fix && !ctx.quiet) {
    console.error(`${DIM}${err.fix}${NC}`);
  }
}
