import type { ProjectStatus, TaskPriority, TaskStatus, TeamRole } from './enums';

export interface Timestamps {
  createdAt: Date;
  updatedAt: Date;
}

export interface User extends Timestamps {
  id: string;
  email: string;
  hashedPassword: string;
  firstName: string;
  lastName: string;
  timezone: string;
  isActive: boolean;
  isVerified: boolean;
  lastLoginAt: Date | null;
  deletedAt: Date | null;
}

export interface Team extends Timestamps {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  isActive: boolean;
  allowPublicSignup: boolean;
  defaultTaskPriority: TaskPriority;
  deletedAt: Date | null;
}

export interface TeamMembership extends Timestamps {
  id: string;
  userId: string;
  teamId: string;
  role: TeamRole;
  invitedAt: Date;
  /** null while the invitation is pending */
  joinedAt: Date | null;
  invitedById: string | null;
  deletedAt: Date | null;
}

export interface Project extends Timestamps {
  id: string;
  teamId: string;
  name: string;
  description: string | null;
  status: ProjectStatus;
  startDate: Date | null;
  endDate: Date | null;
  isActive: boolean;
  color: string | null;
  position: number;
  estimatedHours: number | null;
  deletedAt: Date | null;
}

export interface Task extends Timestamps {
  id: string;
  teamId: string;
  creatorId: string;
  projectId: string | null;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
  position: number;
  estimatedHours: number | null;
  actualHours: number | null;
  isArchived: boolean;
  deletedAt: Date | null;
}

export interface TaskAssignment {
  id: string;
  taskId: string;
  assigneeId: string;
  assignedAt: Date;
  assignedById: string | null;
}

export interface TaskDependency {
  id: string;
  dependentTaskId: string;
  prerequisiteTaskId: string;
  createdAt: Date;
  createdById: string | null;
}

/** Fields the database fills in on insert. */
export type Generated = 'createdAt' | 'updatedAt';

export type NewUser = Omit<User, Generated>;
export type NewTeam = Omit<Team, Generated>;
export type NewTeamMembership = Omit<TeamMembership, Generated>;
export type NewProject = Omit<Project, Generated>;
export type NewTask = Omit<Task, Generated>;

export type UserPatch = Partial<Omit<User, 'id' | Generated>>;
export type TeamPatch = Partial<Omit<Team, 'id' | Generated>>;
export type MembershipPatch = Partial<Pick<TeamMembership, 'role' | 'invitedAt' | 'joinedAt' | 'invitedById' | 'deletedAt'>>;
export type ProjectPatch = Partial<Omit<Project, 'id' | 'teamId' | Generated>>;
export type TaskPatch = Partial<Omit<Task, 'id' | 'teamId' | 'creatorId' | Generated>>;
