/**
 * pv - phased project plans stored as JSON.
 *
 * Library entry point: the plan store and the engine operations the CLI is
 * built on.
 */

// Types
export { ExitCode, getExitCodeName } from './types/exit-codes.js';
export type {
  Plan,
  PlanMeta,
  PlanSummary,
  Phase,
  PhaseProgress,
  Task,
  TaskTracking,
  Subtask,
  PhaseTask,
  TaskStatus,
  PhaseStatus,
  ReservedPhaseId,
} from './types/plan.js';
export type { PlanViewConfig } from './types/config.js';

// Core
export { PlanError } from './core/errors.js';
export { loadConfig } from './core/config.js';
export { createPlan, initPlan } from './core/init.js';
export { checkPlanSchema, assertPlan, isPlan } from './core/schema.js';

// Store
export { loadPlan, savePlan, sortPhases } from './store/plan-store.js';
export { createBackup, listBackups, restoreFromBackup } from './store/backup.js';

// Phases
export {
  addPhase,
  removePhase,
  findPhase,
  requirePhase,
  getCurrentPhase,
  ensureSpecialPhases,
  recalculateProgress,
  RESERVED_PHASES,
} from './core/phases/index.js';

// Tasks
export {
  addTask,
  allocateTaskId,
  parseTaskId,
  depsMet,
  unmetDeps,
  getNextTask,
  classifyUpcoming,
  findTask,
  requireTask,
  getRecentlyCompleted,
  setTaskStatus,
  setTaskField,
  deleteTask,
  relocateTask,
  deferTask,
  markAsBug,
  captureIdea,
  compactTask,
  compactPlan,
} from './core/tasks/index.js';
