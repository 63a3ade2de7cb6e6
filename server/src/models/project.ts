import { isProjectActive, isTaskCompleted } from './enums';
import type { Project, ProjectPatch, Task } from './types';
import { wholeDaysBetween } from '../utils/dates';

export const PROJECT_ACTIONS = ['start', 'complete', 'cancel', 'hold', 'resume'] as const;
export type ProjectAction = (typeof PROJECT_ACTIONS)[number];

type Timeline = Pick<Project, 'status' | 'startDate' | 'endDate'>;

export function isOverdue(project: Timeline, now: Date): boolean {
  if (!project.endDate) return false;
  return isProjectActive(project.status) && now.getTime() > project.endDate.getTime();
}

export function durationDays(project: Timeline): number | null {
  if (!project.startDate || !project.endDate) return null;
  return wholeDaysBetween(project.startDate, project.endDate);
}

export function daysRemaining(project: Timeline, now: Date): number | null {
  if (!project.endDate || !isProjectActive(project.status)) return null;
  return Math.max(0, wholeDaysBetween(now, project.endDate));
}

export function completionPercentage(tasks: Pick<Task, 'status'>[]): number {
  if (tasks.length === 0) return 0;
  const completed = tasks.filter((t) => isTaskCompleted(t.status)).length;
  return (completed / tasks.length) * 100;
}

export function validateTimeline(project: Pick<Project, 'startDate' | 'endDate'>): boolean {
  if (project.startDate && project.endDate) {
    return project.startDate.getTime() <= project.endDate.getTime();
  }
  return true;
}

/**
 * Returns the fields a lifecycle action changes. `resume` only leaves
 * `on_hold`; from any other status it changes nothing.
 */
export function transition(project: Project, action: ProjectAction, now: Date): ProjectPatch {
  switch (action) {
    case 'start':
      return { status: 'active', startDate: project.startDate ?? now };
    case 'complete':
      return { status: 'completed', endDate: project.endDate ?? now };
    case 'cancel':
      return { status: 'cancelled', isActive: false };
    case 'hold':
      return { status: 'on_hold' };
    case 'resume':
      return project.status === 'on_hold' ? { status: 'active' } : {};
  }
}

export function activeTasks<T extends Pick<Task, 'status'>>(tasks: T[]): T[] {
  return tasks.filter((t) => !isTaskCompleted(t.status));
}

export function completedTasks<T extends Pick<Task, 'status'>>(tasks: T[]): T[] {
  return tasks.filter((t) => isTaskCompleted(t.status));
}

export function overdueTasks<T extends Pick<Task, 'status' | 'dueDate'>>(tasks: T[], now: Date): T[] {
  return tasks.filter(
    (t) => t.dueDate !== null && t.dueDate.getTime() < now.getTime() && !isTaskCompleted(t.status)
  );
}
