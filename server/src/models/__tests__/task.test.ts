import { describe, it, expect } from 'vitest';
import {
  applyAction,
  applyStatus,
  blockingTasksCount,
  daysUntilDue,
  isBlocked,
  isOverdue,
  requiresUnblocked,
  statusChange,
  targetStatus,
  wouldCreateCycle
} from '../task';

const now = new Date('2026-03-02T12:00:00Z');
const started = new Date('2026-03-01T09:00:00Z');

describe('task dates', () => {
  it('is overdue only while incomplete', () => {
    const dueDate = new Date('2026-03-01T00:00:00Z');
    expect(isOverdue({ dueDate, status: 'todo' }, now)).toBe(true);
    expect(isOverdue({ dueDate, status: 'done' }, now)).toBe(false);
    expect(isOverdue({ dueDate: null, status: 'todo' }, now)).toBe(false);
  });

  it('floors days until due', () => {
    expect(daysUntilDue({ dueDate: new Date('2026-03-04T00:00:00Z') }, now)).toBe(1);
    expect(daysUntilDue({ dueDate: new Date('2026-03-02T00:00:00Z') }, now)).toBe(-1);
    expect(daysUntilDue({ dueDate: null }, now)).toBeNull();
  });
});

describe('blocking', () => {
  it('is blocked while any prerequisite is incomplete', () => {
    expect(isBlocked([{ status: 'done' }, { status: 'in_review' }])).toBe(true);
    expect(isBlocked([{ status: 'done' }, { status: 'cancelled' }])).toBe(false);
    expect(isBlocked([])).toBe(false);
  });

  it('counts incomplete dependents', () => {
    expect(blockingTasksCount([{ status: 'todo' }, { status: 'done' }, { status: 'in_progress' }])).toBe(2);
  });

  it('guards the work statuses', () => {
    expect(requiresUnblocked('in_progress')).toBe(true);
    expect(requiresUnblocked('done')).toBe(true);
    expect(requiresUnblocked('cancelled')).toBe(false);
    expect(requiresUnblocked('todo')).toBe(false);
  });
});

describe('status changes', () => {
  it('going back to todo clears both timestamps', () => {
    expect(statusChange({ startedAt: started }, 'todo', now)).toEqual({
      status: 'todo',
      startedAt: null,
      completedAt: null
    });
  });

  it('keeps the first start time', () => {
    expect(statusChange({ startedAt: started }, 'in_review', now)).toEqual({
      status: 'in_review',
      startedAt: started,
      completedAt: null
    });
    expect(statusChange({ startedAt: null }, 'in_progress', now)).toEqual({
      status: 'in_progress',
      startedAt: now,
      completedAt: null
    });
  });

  it('stamps completion', () => {
    expect(statusChange({ startedAt: null }, 'cancelled', now)).toEqual({ status: 'cancelled', completedAt: now });
  });
});

describe('actions', () => {
  const todo = { status: 'todo' as const, startedAt: null, isArchived: false };
  const done = { status: 'done' as const, startedAt: started, isArchived: false };

  it('start moves todo to in_progress only', () => {
    expect(targetStatus(todo, 'start')).toBe('in_progress');
    expect(applyAction(todo, 'start', now)).toEqual({ status: 'in_progress', startedAt: now });
    expect(applyAction(done, 'start', now)).toBeNull();
  });

  it('complete and cancel stamp completedAt', () => {
    expect(applyAction(todo, 'complete', now)).toEqual({ status: 'done', completedAt: now });
    expect(applyAction(todo, 'cancel', now)).toEqual({ status: 'cancelled', completedAt: now });
  });

  it('reopen only applies to completed tasks', () => {
    expect(applyAction(done, 'reopen', now)).toEqual({ status: 'todo', startedAt: null, completedAt: null });
    expect(applyAction(todo, 'reopen', now)).toBeNull();
  });

  it('archive and unarchive toggle the flag', () => {
    expect(applyAction(todo, 'archive', now)).toEqual({ isArchived: true });
    expect(applyAction(todo, 'unarchive', now)).toBeNull();
    expect(applyAction({ ...todo, isArchived: true }, 'unarchive', now)).toEqual({ isArchived: false });
  });
});

describe('applyStatus', () => {
  const todo = { status: 'todo' as const, startedAt: null, isArchived: false };
  const working = { status: 'in_progress' as const, startedAt: started, isArchived: false };
  const done = { status: 'done' as const, startedAt: started, isArchived: false };

  it('follows the action that leads to each status', () => {
    expect(applyStatus(todo, 'in_progress', now)).toEqual({ status: 'in_progress', startedAt: now });
    expect(applyStatus(working, 'done', now)).toEqual({ status: 'done', completedAt: now });
    expect(applyStatus(done, 'todo', now)).toEqual({ status: 'todo', startedAt: null, completedAt: null });
    expect(applyStatus(done, 'in_progress', now)).toBeNull();
    expect(applyStatus(working, 'todo', now)).toBeNull();
  });

  it('enters review only from in_progress', () => {
    expect(applyStatus(working, 'in_review', now)).toEqual({ status: 'in_review', startedAt: started, completedAt: null });
    expect(applyStatus(todo, 'in_review', now)).toBeNull();
  });
});

describe('wouldCreateCycle', () => {
  // a depends on b, b depends on c
  const edges = [
    { dependentTaskId: 'a', prerequisiteTaskId: 'b' },
    { dependentTaskId: 'b', prerequisiteTaskId: 'c' }
  ];

  it('detects a transitive loop', () => {
    expect(wouldCreateCycle(edges, 'c', 'a')).toBe(true);
    expect(wouldCreateCycle(edges, 'b', 'a')).toBe(true);
  });

  it('allows edges along the existing direction', () => {
    expect(wouldCreateCycle(edges, 'a', 'c')).toBe(false);
    expect(wouldCreateCycle(edges, 'd', 'a')).toBe(false);
  });

  it('treats a self edge as a cycle', () => {
    expect(wouldCreateCycle([], 'a', 'a')).toBe(true);
  });
});
