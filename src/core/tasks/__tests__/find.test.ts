/**
 * Tests for task lookup and not-found suggestions.
 */

import { describe, it, expect } from 'vitest';
import { findTask, formatTaskSuggestions, getRecentlyCompleted, requireTask } from '../find.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { catchPlanError, makePhase, makePlan, makeTask } from '../../__tests__/fixtures.js';

describe('findTask / requireTask', () => {
  const plan = makePlan([
    makePhase('0', [makeTask('0.1.1', { title: 'Schema' }), makeTask('0.1.2', { title: 'Models' })]),
    makePhase('1', [makeTask('1.1.1', { title: 'API' })]),
  ]);

  it('returns the task with its phase', () => {
    const found = findTask(plan, '1.1.1');
    expect(found?.phase.id).toBe('1');
    expect(found?.task.title).toBe('API');
    expect(findTask(plan, '2.1.1')).toBeNull();
  });

  it('suggests tasks from the same phase when the ID is unknown', () => {
    const err = catchPlanError(() => requireTask(plan, '0.1.7'));
    expect(err.code).toBe(ExitCode.NOT_FOUND);
    expect(err.message).toBe("Task '0.1.7' not found");
    expect(err.fix).toBe('Available tasks:\n  0.1.1: Schema\n  0.1.2: Models');
  });

  it('falls back to open tasks of the working phases', () => {
    const err = catchPlanError(() => requireTask(plan, '9.1.1'));
    expect(err.fix).toBe('Available tasks:\n  0.1.1: Schema\n  0.1.2: Models\n  1.1.1: API');
  });
});

describe('formatTaskSuggestions', () => {
  it('explains how to add a task when the plan has none', () => {
    expect(formatTaskSuggestions(makePlan([makePhase('0')]))).toBe(
      'No tasks yet. Add one with: pv add-task <phase> "<title>"',
    );
  });

  it('caps the list at ten entries', () => {
    const tasks = Array.from({ length: 12 }, (_, i) => makeTask(`0.1.${i + 1}`, { title: `T${i + 1}` }));
    const lines = formatTaskSuggestions(makePlan([makePhase('0', tasks)]), '0.1.99').split('\n');
    expect(lines).toHaveLength(12);
    expect(lines[10]).toBe('  0.1.10: T10');
    expect(lines[11]).toBe('  ... and 2 more');
  });
});

describe('getRecentlyCompleted', () => {
  const plan = makePlan([
    makePhase('0', [
      makeTask('0.1.1', { status: 'completed', tracking: { completed_at: '2024-01-02T00:00:00.000Z' } }),
      makeTask('0.1.2', { status: 'completed' }),
      makeTask('0.1.3', { status: 'completed', tracking: { completed_at: '2024-03-01T00:00:00.000Z' } }),
      makeTask('0.1.4'),
    ]),
    makePhase('1', [
      makeTask('1.1.1', { status: 'completed', tracking: { completed_at: '2024-02-01T00:00:00.000Z' } }),
    ]),
  ]);

  it('sorts newest first with unstamped tasks last', () => {
    expect(getRecentlyCompleted(plan).map((e) => e.task.id)).toEqual(['0.1.3', '1.1.1', '0.1.1', '0.1.2']);
  });

  it('limits the result to count', () => {
    expect(getRecentlyCompleted(plan, 2).map((e) => e.task.id)).toEqual(['0.1.3', '1.1.1']);
  });
});
