import type { RowDataPacket } from 'mysql2/promise';
import {
  isProjectStatus,
  isTaskPriority,
  isTaskStatus,
  isTeamRole,
  type ProjectStatus,
  type TaskPriority,
  type TaskStatus,
  type TeamRole
} from '../../models/enums';
import type {
  Project,
  Task,
  TaskAssignment,
  TaskDependency,
  Team,
  TeamMembership,
  User
} from '../../models/types';

export type SqlValue = string | number | boolean | Date | null;

export interface UserRow extends RowDataPacket {
  id: string;
  email: string;
  hashed_password: string;
  first_name: string;
  last_name: string;
  timezone: string;
  is_active: number;
  is_verified: number;
  last_login_at: Date | null;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface TeamRow extends RowDataPacket {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  is_active: number;
  allow_public_signup: number;
  default_task_priority: string;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface MembershipRow extends RowDataPacket {
  id: string;
  user_id: string;
  team_id: string;
  role: string;
  invited_at: Date;
  joined_at: Date | null;
  invited_by_id: string | null;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface ProjectRow extends RowDataPacket {
  id: string;
  team_id: string;
  name: string;
  description: string | null;
  status: string;
  start_date: Date | null;
  end_date: Date | null;
  is_active: number;
  color: string | null;
  position: number;
  estimated_hours: number | null;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface TaskRow extends RowDataPacket {
  id: string;
  team_id: string;
  creator_id: string;
  project_id: string | null;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  due_date: Date | null;
  started_at: Date | null;
  completed_at: Date | null;
  position: number;
  estimated_hours: number | null;
  actual_hours: number | null;
  is_archived: number;
  deleted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface AssignmentRow extends RowDataPacket {
  id: string;
  task_id: string;
  assignee_id: string;
  assigned_at: Date;
  assigned_by_id: string | null;
}

export interface DependencyRow extends RowDataPacket {
  id: string;
  dependent_task_id: string;
  prerequisite_task_id: string;
  created_at: Date;
  created_by_id: string | null;
}

function enumValue<T extends string>(guard: (v: string) => v is T, value: string, column: string): T {
  if (!guard(value)) {
    throw new Error(`Unexpected value '${value}' in column ${column}`);
  }
  return value;
}

export const toRole = (v: string): TeamRole => enumValue(isTeamRole, v, 'role');
export const toTaskStatus = (v: string): TaskStatus => enumValue(isTaskStatus, v, 'status');
export const toPriority = (v: string): TaskPriority => enumValue(isTaskPriority, v, 'priority');
export const toProjectStatus = (v: string): ProjectStatus => enumValue(isProjectStatus, v, 'status');

export function mapUserRow(r: UserRow): User {
  return {
    id: r.id,
    email: r.email,
    hashedPassword: r.hashed_password,
    firstName: r.first_name,
    lastName: r.last_name,
    timezone: r.timezone,
    isActive: Boolean(r.is_active),
    isVerified: Boolean(r.is_verified),
    lastLoginAt: r.last_login_at,
    deletedAt: r.deleted_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export function mapTeamRow(r: TeamRow): Team {
  return {
    id: r.id,
    name: r.name,
    slug: r.slug,
    description: r.description,
    isActive: Boolean(r.is_active),
    allowPublicSignup: Boolean(r.allow_public_signup),
    defaultTaskPriority: toPriority(r.default_task_priority),
    deletedAt: r.deleted_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export function mapMembershipRow(r: MembershipRow): TeamMembership {
  return {
    id: r.id,
    userId: r.user_id,
    teamId: r.team_id,
    role: toRole(r.role),
    invitedAt: r.invited_at,
    joinedAt: r.joined_at,
    invitedById: r.invited_by_id,
    deletedAt: r.deleted_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export function mapProjectRow(r: ProjectRow): Project {
  return {
    id: r.id,
    teamId: r.team_id,
    name: r.name,
    description: r.description,
    status: toProjectStatus(r.status),
    startDate: r.start_date,
    endDate: r.end_date,
    isActive: Boolean(r.is_active),
    color: r.color,
    position: Number(r.position),
    estimatedHours: r.estimated_hours === null ? null : Number(r.estimated_hours),
    deletedAt: r.deleted_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export function mapTaskRow(r: TaskRow): Task {
  return {
    id: r.id,
    teamId: r.team_id,
    creatorId: r.creator_id,
    projectId: r.project_id,
    title: r.title,
    description: r.description,
    status: toTaskStatus(r.status),
    priority: toPriority(r.priority),
    dueDate: r.due_date,
    startedAt: r.started_at,
    completedAt: r.completed_at,
    position: Number(r.position),
    estimatedHours: r.estimated_hours === null ? null : Number(r.estimated_hours),
    actualHours: r.actual_hours === null ? null : Number(r.actual_hours),
    isArchived: Boolean(r.is_archived),
    deletedAt: r.deleted_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export function mapAssignmentRow(r: AssignmentRow): TaskAssignment {
  return {
    id: r.id,
    taskId: r.task_id,
    assigneeId: r.assignee_id,
    assignedAt: r.assigned_at,
    assignedById: r.assigned_by_id
  };
}

export function mapDependencyRow(r: DependencyRow): TaskDependency {
  return {
    id: r.id,
    dependentTaskId: r.dependent_task_id,
    prerequisiteTaskId: r.prerequisite_task_id,
    createdAt: r.created_at,
    createdById: r.created_by_id
  };
}

function toSqlValue(value: unknown, field: string): SqlValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  throw new Error(`Cannot store field ${field} of type ${typeof value}`);
}

/**
 * Turns a camelCase patch into `column = ?` fragments and their values.
 * Keys missing from `columns` are rejected; undefined values are skipped.
 */
export function buildUpdate(
  patch: object,
  columns: Readonly<Record<string, string>>
): { sets: string[]; vals: SqlValue[] } {
  const sets: string[] = [];
  const vals: SqlValue[] = [];
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const column = columns[field];
    if (!column) {
      throw new Error(`Field ${field} cannot be updated`);
    }
    sets.push(`${column} = ?`);
    vals.push(toSqlValue(value, field));
  }
  return { sets, vals };
}

/** `(?, ?, ?)` for an IN clause; callers must not pass an empty list. */
export function placeholders(count: number): string {
  return `(${new Array(count).fill('?').join(', ')})`;
}
