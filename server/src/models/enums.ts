/**
 * Value sets shared by models, schemas and the database layer.
 *
 * Each set is a readonly tuple so zod can build an enum from it and the
 * union type is derived from the same list that `schema.sql` mirrors.
 */

export const TEAM_ROLES = ['owner', 'admin', 'member', 'viewer'] as const;
export type TeamRole = (typeof TEAM_ROLES)[number];

const ROLE_LEVELS: Record<TeamRole, number> = {
  viewer: 1,
  member: 2,
  admin: 3,
  owner: 4
};

export const ADMIN_ROLES: readonly TeamRole[] = ['owner', 'admin'];

export function roleLevel(role: TeamRole): number {
  return ROLE_LEVELS[role];
}

/** True when `role` sits at or above `required` in owner > admin > member > viewer. */
export function roleAtLeast(role: TeamRole, required: TeamRole): boolean {
  return roleLevel(role) >= roleLevel(required);
}

export function canModifyTeam(role: TeamRole): boolean {
  return ADMIN_ROLES.includes(role);
}

export const TASK_STATUSES = ['todo', 'in_progress', 'in_review', 'done', 'cancelled'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const ACTIVE_TASK_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress', 'in_review'];
export const COMPLETED_TASK_STATUSES: readonly TaskStatus[] = ['done', 'cancelled'];

export function isTaskActive(status: TaskStatus): boolean {
  return ACTIVE_TASK_STATUSES.includes(status);
}

export function isTaskCompleted(status: TaskStatus): boolean {
  return COMPLETED_TASK_STATUSES.includes(status);
}

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

const PRIORITY_SCORES: Record<TaskPriority, number> = {
  urgent: 4,
  high: 3,
  medium: 2,
  low: 1
};

/** Highest first. */
export const PRIORITY_ORDER: readonly TaskPriority[] = ['urgent', 'high', 'medium', 'low'];

export function priorityScore(priority: TaskPriority): number {
  return PRIORITY_SCORES[priority];
}

export const PROJECT_STATUSES = ['planning', 'active', 'on_hold', 'completed', 'cancelled'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const ACTIVE_PROJECT_STATUSES: readonly ProjectStatus[] = ['planning', 'active', 'on_hold'];

export function isProjectActive(status: ProjectStatus): boolean {
  return ACTIVE_PROJECT_STATUSES.includes(status);
}

function member<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value);
}

export const isTeamRole = (value: string): value is TeamRole => member(TEAM_ROLES, value);
export const isTaskStatus = (value: string): value is TaskStatus => member(TASK_STATUSES, value);
export const isTaskPriority = (value: string): value is TaskPriority =>
  member(TASK_PRIORITIES, value);
export const isProjectStatus = (value: string): value is ProjectStatus =>
  member(PROJECT_STATUSES, value);
