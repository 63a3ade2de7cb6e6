import { isTaskCompleted, type TaskStatus } from './enums';
import type { Task, TaskAssignment, TaskDependency, TaskPatch } from './types';
import { wholeDaysBetween } from '../utils/dates';

export const TASK_ACTIONS = ['start', 'complete', 'cancel', 'reopen', 'archive', 'unarchive'] as const;
export type TaskAction = (typeof TASK_ACTIONS)[number];

/** Statuses a task may only enter once every prerequisite is completed. */
export const UNBLOCKED_ONLY_STATUSES: readonly TaskStatus[] = ['in_progress', 'in_review', 'done'];

export function isOverdue(task: Pick<Task, 'dueDate' | 'status'>, now: Date): boolean {
  if (!task.dueDate || isTaskCompleted(task.status)) return false;
  return now.getTime() > task.dueDate.getTime();
}

export function daysUntilDue(task: Pick<Task, 'dueDate'>, now: Date): number | null {
  if (!task.dueDate) return null;
  return wholeDaysBetween(now, task.dueDate);
}

export function isBlocked(prerequisites: Pick<Task, 'status'>[]): boolean {
  return prerequisites.some((t) => !isTaskCompleted(t.status));
}

export function blockingTasksCount(dependents: Pick<Task, 'status'>[]): number {
  return dependents.filter((t) => !isTaskCompleted(t.status)).length;
}

export function requiresUnblocked(status: TaskStatus): boolean {
  return UNBLOCKED_ONLY_STATUSES.includes(status);
}

/** The status an action moves to, or null when it does not touch the status. */
export function targetStatus(task: Pick<Task, 'status'>, action: TaskAction): TaskStatus | null {
  switch (action) {
    case 'start':
      return task.status === 'todo' ? 'in_progress' : null;
    case 'complete':
      return 'done';
    case 'cancel':
      return 'cancelled';
    case 'reopen':
      return isTaskCompleted(task.status) ? 'todo' : null;
    case 'archive':
    case 'unarchive':
      return null;
  }
}

/**
 * Fields that change when a task enters `status`. Timestamps follow the
 * workflow: work statuses stamp startedAt once, completed statuses stamp
 * completedAt, going back to `todo` clears both.
 */
export function statusChange(task: Pick<Task, 'startedAt'>, status: TaskStatus, now: Date): TaskPatch {
  switch (status) {
    case 'todo':
      return { status, startedAt: null, completedAt: null };
    case 'in_progress':
    case 'in_review':
      return { status, startedAt: task.startedAt ?? now, completedAt: null };
    case 'done':
    case 'cancelled':
      return { status, completedAt: now };
  }
}

/** Patch for an action, or null when the action does not apply in the task's current state. */
export function applyAction(task: Pick<Task, 'status' | 'startedAt' | 'isArchived'>, action: TaskAction, now: Date): TaskPatch | null {
  if (action === 'archive') return task.isArchived ? null : { isArchived: true };
  if (action === 'unarchive') return task.isArchived ? { isArchived: false } : null;

  const next = targetStatus(task, action);
  if (next === null) return null;
  if (action === 'start') return { status: next, startedAt: now };
  return statusChange(task, next, now);
}

/** The action each status is reached through when a task is edited directly. */
export const STATUS_ACTIONS = {
  todo: 'reopen',
  in_progress: 'start',
  done: 'complete',
  cancelled: 'cancel'
} as const satisfies Record<Exclude<TaskStatus, 'in_review'>, TaskAction>;

/**
 * Patch for moving a task to `status` by editing it, or null when the
 * workflow has no such step. `in_review` only follows `in_progress`.
 */
export function applyStatus(task: Pick<Task, 'status' | 'startedAt' | 'isArchived'>, status: TaskStatus, now: Date): TaskPatch | null {
  if (status === 'in_review') {
    return task.status === 'in_progress' ? statusChange(task, status, now) : null;
  }
  return applyAction(task, STATUS_ACTIONS[status], now);
}

export function findAssignment(assignments: TaskAssignment[], userId: string): TaskAssignment | undefined {
  return assignments.find((a) => a.assigneeId === userId);
}

export function findDependency(dependencies: TaskDependency[], prerequisiteTaskId: string): TaskDependency | undefined {
  return dependencies.find((d) => d.prerequisiteTaskId === prerequisiteTaskId);
}

export type DependencyEdge = Pick<TaskDependency, 'dependentTaskId' | 'prerequisiteTaskId'>;

/**
 * Whether adding `dependentId → prerequisiteId` closes a loop, i.e. the
 * prerequisite already depends, directly or transitively, on the dependent.
 */
export function wouldCreateCycle(edges: DependencyEdge[], dependentId: string, prerequisiteId: string): boolean {
  if (dependentId === prerequisiteId) return true;

  const prerequisitesOf = new Map<string, string[]>();
  for (const edge of edges) {
    const list = prerequisitesOf.get(edge.dependentTaskId) ?? [];
    list.push(edge.prerequisiteTaskId);
    prerequisitesOf.set(edge.dependentTaskId, list);
  }

  const seen = new Set<string>();
  const stack = [prerequisiteId];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    if (current === dependentId) return true;
    seen.add(current);
    stack.push(...(prerequisitesOf.get(current) ?? []));
  }
  return false;
}
