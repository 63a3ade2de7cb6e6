import type { ProjectStatus, TaskPriority, TaskStatus } from '../models/enums';
import type {
  MembershipPatch,
  NewProject,
  NewTask,
  NewTeam,
  NewTeamMembership,
  NewUser,
  Project,
  ProjectPatch,
  Task,
  TaskAssignment,
  TaskDependency,
  TaskPatch,
  Team,
  TeamMembership,
  TeamPatch,
  User,
  UserPatch
} from '../models/types';

export interface Page {
  skip: number;
  limit: number;
}

export interface UserRepository {
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  /** Case-insensitive; includes deactivated accounts since the address stays taken. */
  findByEmail(email: string): Promise<User | null>;
  findByIds(ids: string[]): Promise<User[]>;
  update(id: string, patch: UserPatch): Promise<User | null>;
}

export interface TeamRepository {
  /** Inserts the team and its founding membership atomically. */
  createWithOwner(team: NewTeam, owner: NewTeamMembership): Promise<{ team: Team; membership: TeamMembership }>;
  /** Soft-deleted teams are not returned. */
  findById(id: string): Promise<Team | null>;
  /** Includes soft-deleted teams: slugs are never reused. */
  findBySlug(slug: string): Promise<Team | null>;
  findByIds(ids: string[]): Promise<Team[]>;
  update(id: string, patch: TeamPatch): Promise<Team | null>;

  createMembership(membership: NewTeamMembership): Promise<TeamMembership>;
  /** Any state: pending, active or removed. */
  findMembership(teamId: string, userId: string): Promise<TeamMembership | null>;
  listMemberships(teamId: string): Promise<TeamMembership[]>;
  listMembershipsForUser(userId: string): Promise<TeamMembership[]>;
  updateMembership(id: string, patch: MembershipPatch): Promise<TeamMembership | null>;
}

export interface ProjectFilter {
  status?: ProjectStatus;
  includeInactive?: boolean;
}

export interface ProjectRepository {
  create(project: NewProject): Promise<Project>;
  findById(id: string): Promise<Project | null>;
  /** Includes soft-deleted projects, matching the (team, name) unique key. */
  findByName(teamId: string, name: string): Promise<Project | null>;
  listByTeam(teamId: string, filter?: ProjectFilter): Promise<Project[]>;
  update(id: string, patch: ProjectPatch): Promise<Project | null>;
}

export interface TaskFilter {
  teamIds: string[];
  projectId?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  assigneeId?: string;
  includeArchived?: boolean;
}

export interface TaskRepository {
  create(task: NewTask): Promise<Task>;
  /** Soft-deleted tasks are not returned by any finder. */
  findById(id: string): Promise<Task | null>;
  findByIds(ids: string[]): Promise<Task[]>;
  list(filter: TaskFilter, page: Page): Promise<Task[]>;
  listByProject(projectId: string): Promise<Task[]>;
  update(id: string, patch: TaskPatch): Promise<Task | null>;

  listAssignments(taskIds: string[]): Promise<TaskAssignment[]>;
  createAssignment(assignment: TaskAssignment): Promise<TaskAssignment>;
  deleteAssignment(taskId: string, assigneeId: string): Promise<boolean>;

  /** Edges whose dependent task is one of `taskIds`. */
  listDependencies(taskIds: string[]): Promise<TaskDependency[]>;
  /** Edges whose prerequisite task is one of `taskIds`. */
  listDependents(taskIds: string[]): Promise<TaskDependency[]>;
  /** Every edge between tasks of one team, for cycle checks. */
  listTeamDependencies(teamId: string): Promise<TaskDependency[]>;
  createDependency(dependency: TaskDependency): Promise<TaskDependency>;
  deleteDependency(dependentTaskId: string, prerequisiteTaskId: string): Promise<boolean>;
}

export interface Repositories {
  users: UserRepository;
  teams: TeamRepository;
  projects: ProjectRepository;
  tasks: TaskRepository;
}
