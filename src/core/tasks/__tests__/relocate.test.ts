/**
 * Tests for relocation and the triage helpers.
 */

import { describe, it, expect } from 'vitest';
import { captureIdea, deferTask, markAsBug, relocateTask } from '../relocate.js';
import { ExitCode } from '../../../types/exit-codes.js';
import { allTaskIds, catchPlanError, makePhase, makePlan, makeTask } from '../../__tests__/fixtures.js';

describe('relocateTask', () => {
  it('moves a task under a new ID and clears its dependencies', () => {
    const task = makeTask('0.1.2', {
      title: 'Wire up auth',
      agent_type: 'backend',
      depends_on: ['0.1.1'],
      tracking: { started_at: '2024-02-01T00:00:00.000Z' },
    });
    const plan = makePlan([
      makePhase('0', [makeTask('0.1.1'), task]),
      makePhase('1', [makeTask('1.1.1'), makeTask('1.2.1')]),
    ]);

    const result = relocateTask(plan, '0.1.2', '1');

    expect(result.oldId).toBe('0.1.2');
    expect(result.newId).toBe('1.2.2');
    expect(result.fromPhase.id).toBe('0');
    expect(result.toPhase.id).toBe('1');
    expect(result.task).toEqual({
      id: '1.2.2',
      title: 'Wire up auth',
      status: 'pending',
      agent_type: 'backend',
      depends_on: [],
      tracking: { started_at: '2024-02-01T00:00:00.000Z' },
    });
    expect(allTaskIds(plan)).toEqual(['0.1.1', '1.1.1', '1.2.1', '1.2.2']);
  });

  it('creates a reserved target phase on first use', () => {
    const plan = makePlan([makePhase('0', [makeTask('0.1.1')])]);
    const result = relocateTask(plan, '0.1.1', 'ideas');
    expect(result.newId).toBe('ideas.1.1');
    expect(result.toPhase.name).toBe('Ideas');
    expect(plan.phases.map((p) => p.id)).toEqual(['0', 'ideas']);
  });

  it('leaves dependents pointing at the old ID', () => {
    const plan = makePlan([
      makePhase('0', [makeTask('0.1.1'), makeTask('0.1.2', { depends_on: ['0.1.1'] })]),
    ]);
    relocateTask(plan, '0.1.1', 'deferred');
    expect(plan.phases[0]?.tasks[0]?.depends_on).toEqual(['0.1.1']);
  });

  it('throws NOT_FOUND for an unknown task', () => {
    const plan = makePlan([makePhase('0')]);
    expect(catchPlanError(() => relocateTask(plan, '0.1.9', 'bugs')).code).toBe(ExitCode.NOT_FOUND);
  });

  it('throws UNKNOWN_PHASE for a target that is neither existing nor reserved', () => {
    const plan = makePlan([makePhase('0', [makeTask('0.1.1')])]);
    const err = catchPlanError(() => relocateTask(plan, '0.1.1', 'later'));
    expect(err.code).toBe(ExitCode.UNKNOWN_PHASE);
    expect(err.message).toBe("Unknown phase 'later': not an existing phase or one of bugs, ideas, deferred");
    expect(allTaskIds(plan)).toEqual(['0.1.1']);
  });

  it('keeps task IDs unique across the plan', () => {
    const plan = makePlan([
      makePhase('0', [makeTask('0.1.1'), makeTask('0.1.2'), makeTask('0.1.3')]),
      makePhase('bugs', [makeTask('bugs.1.1')]),
    ]);
    relocateTask(plan, '0.1.1', 'bugs');
    relocateTask(plan, '0.1.3', 'bugs');
    relocateTask(plan, 'bugs.1.1', '0');
    const ids = allTaskIds(plan);
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toEqual(['0.1.2', '0.1.3', 'bugs.1.2', 'bugs.1.3']);
  });
});

describe('deferTask', () => {
  it('moves an existing task and records a trimmed reason', () => {
    const plan = makePlan([makePhase('0', [makeTask('0.1.1')])]);
    const result = deferTask(plan, '0.1.1', '  waiting on vendor  ');
    expect(result.kind).toBe('moved');
    expect(result.task.id).toBe('deferred.1.1');
    expect(result.task.tracking).toEqual({ defer_reason: 'waiting on vendor' });
  });

  it('does not store a blank reason', () => {
    const plan = makePlan([makePhase('0', [makeTask('0.1.1')])]);
    expect(deferTask(plan, '0.1.1', '   ').task.tracking).toEqual({});
  });

  it('captures free text as a new pending task', () => {
    const plan = makePlan([makePhase('0')]);
    const result = deferTask(plan, 'Dark mode');
    expect(result.kind).toBe('created');
    expect(result.task).toEqual({
      id: 'deferred.1.1',
      title: 'Dark mode',
      status: 'pending',
      agent_type: null,
      depends_on: [],
      tracking: {},
    });
  });
});

describe('markAsBug / captureIdea', () => {
  it('sends an existing task to bugs', () => {
    const plan = makePlan([makePhase('0', [makeTask('0.1.1')]), makePhase('bugs', [makeTask('bugs.1.1')])]);
    const result = markAsBug(plan, '0.1.1');
    expect(result.kind === 'moved' && result.oldId).toBe('0.1.1');
    expect(result.task.id).toBe('bugs.1.2');
  });

  it('captures a new idea, creating the ideas phase', () => {
    const plan = makePlan([makePhase('0')]);
    const result = captureIdea(plan, 'Offline sync');
    expect(result.toPhase.id).toBe('ideas');
    expect(result.task.id).toBe('ideas.1.1');
    expect(result.task.title).toBe('Offline sync');
  });
});
