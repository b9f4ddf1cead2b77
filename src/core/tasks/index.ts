/**
 * Task operations barrel export.
 */

export {
  addTask,
  appendNewTask,
  createTask,
  parseDependsList,
  validateTitle,
  type AddTaskOptions,
  type AddTaskResult,
} from './add.js';
export { allocateTaskId, parseTaskId, type TaskIdParts } from './id.js';
export { buildTaskLookup, depsMet, depsReady, unmetDeps } from './deps-ready.js';
export { getNextTask, classifyUpcoming, type UpcomingTask } from './next.js';
export { findTask, requireTask, formatTaskSuggestions, getRecentlyCompleted } from './find.js';
export {
  applyStatus,
  setTaskStatus,
  setTaskField,
  validateStatus,
  SETTABLE_FIELDS,
  type SettableField,
  type UpdateTaskResult,
} from './update.js';
export { deleteTask } from './delete.js';
export {
  relocateTask,
  deferTask,
  markAsBug,
  captureIdea,
  type RelocateResult,
  type TriageResult,
} from './relocate.js';
export { compactTask, compactPlan, countCompactable, type CompactTaskResult } from './compact.js';
