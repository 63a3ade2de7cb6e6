import { randomUUID } from 'crypto';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  isDuplicateEntryError
} from '../errors';
import type { Logger } from '../logger';
import { isTaskCompleted, roleAtLeast, type TaskStatus, type TeamRole } from '../models/enums';
import {
  applyAction,
  applyStatus,
  blockingTasksCount,
  daysUntilDue,
  findAssignment,
  findDependency,
  isBlocked,
  isOverdue,
  requiresUnblocked,
  STATUS_ACTIONS,
  wouldCreateCycle,
  type TaskAction
} from '../models/task';
import type { Task, TaskAssignment, TaskDependency, TaskPatch, User } from '../models/types';
import type {
  Page,
  ProjectRepository,
  TaskFilter,
  TaskRepository,
  TeamRepository
} from '../repositories/types';
import type { TaskCreateInput, TaskUpdateInput } from '../schemas/task';
import { utcNow } from '../utils/dates';
import { TeamAccess } from './access';

export interface TaskView extends Task {
  assigneeIds: string[];
  isBlocked: boolean;
  isOverdue: boolean;
  daysUntilDue: number | null;
  blockingTasksCount: number;
}

export interface TaskActionResult {
  task: TaskView;
  /** Dependents that became workable because this task completed. */
  unblockedTaskIds: string[];
}

export interface AssignResult {
  assignment: TaskAssignment;
  created: boolean;
}

export interface DependencyResult {
  dependency: TaskDependency;
  created: boolean;
}

export interface DependencyLink extends TaskDependency {
  task: Pick<Task, 'id' | 'title' | 'status'>;
  /** The edge's prerequisite is not completed yet. */
  isBlocking: boolean;
}

export interface DependencyListing {
  prerequisites: DependencyLink[];
  dependents: DependencyLink[];
}

export type TaskQuery = Omit<TaskFilter, 'teamIds'> & Partial<Page>;

const NOT_FOUND = 'Task not found';
const NOT_A_MEMBER = 'Assignee must be an active team member';
const BLOCKED = 'Task is blocked by incomplete dependencies';
const DEFAULT_PAGE: Page = { skip: 0, limit: 100 };

export class TaskService {
  private readonly access: TeamAccess;

  constructor(
    private readonly tasks: TaskRepository,
    private readonly projects: ProjectRepository,
    private readonly teams: TeamRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = utcNow
  ) {
    this.access = new TeamAccess(teams);
  }

  async createTask(actor: User, teamId: string, data: TaskCreateInput): Promise<TaskView> {
    const { team } = await this.access.require(teamId, actor.id, 'member');
    if (data.projectId) await this.assertProjectInTeam(data.projectId, teamId);

    const assigneeIds = [...new Set(data.assigneeIds)];
    for (const userId of assigneeIds) {
      if (!(await this.access.isActiveMember(teamId, userId))) throw new BadRequestError(NOT_A_MEMBER);
    }

    const now = this.now();
    const task = await this.tasks.create({
      id: randomUUID(),
      teamId,
      creatorId: actor.id,
      projectId: data.projectId ?? null,
      title: data.title,
      description: data.description ?? null,
      status: 'todo',
      priority: data.priority ?? team.defaultTaskPriority,
      dueDate: data.dueDate ?? null,
      startedAt: null,
      completedAt: null,
      position: data.position,
      estimatedHours: data.estimatedHours ?? null,
      actualHours: null,
      isArchived: false,
      deletedAt: null
    });
    for (const assigneeId of assigneeIds) {
      await this.tasks.createAssignment({
        id: randomUUID(),
        taskId: task.id,
        assigneeId,
        assignedAt: now,
        assignedById: actor.id
      });
    }
    this.logger.info(`User ${actor.id} created task ${task.id} in team ${teamId}`);
    return this.view(task);
  }

  async listTasks(actor: User, teamId: string, query: TaskQuery = {}): Promise<TaskView[]> {
    await this.access.require(teamId, actor.id, 'viewer');
    return this.query([teamId], query);
  }

  /** Tasks assigned to the actor in every team they are an active member of. */
  async listMyTasks(actor: User, query: TaskQuery = {}): Promise<TaskView[]> {
    const memberships = await this.teams.listMembershipsForUser(actor.id);
    const teamIds = memberships.filter((m) => m.joinedAt && !m.deletedAt).map((m) => m.teamId);
    const teams = await this.teams.findByIds(teamIds);
    return this.query(
      teams.map((t) => t.id),
      { ...query, assigneeId: actor.id }
    );
  }

  async getTask(actor: User, taskId: string): Promise<TaskView> {
    return this.view(await this.load(actor, taskId, 'viewer'));
  }

  /**
   * Edits a task. A status change takes the same step the matching action
   * would (`todo` reopen, `in_progress` start, `done` complete, `cancelled`
   * cancel); `in_review` is only reachable from `in_progress`.
   */
  async updateTask(actor: User, taskId: string, patch: TaskUpdateInput): Promise<TaskActionResult> {
    const task = await this.load(actor, taskId, 'member');
    if (patch.projectId) await this.assertProjectInTeam(patch.projectId, task.teamId);

    const fields: TaskPatch = {
      title: patch.title,
      description: patch.description,
      priority: patch.priority,
      dueDate: patch.dueDate,
      projectId: patch.projectId,
      position: patch.position,
      estimatedHours: patch.estimatedHours,
      actualHours: patch.actualHours
    };
    if (patch.status === undefined || patch.status === task.status) {
      return this.commit(actor, task, fields, false);
    }

    const step = applyStatus(task, patch.status, this.now());
    if (!step) throw new ConflictError(statusRefusal(task, patch.status));
    return this.commit(actor, task, { ...fields, ...step }, task.status === 'todo' && patch.status === 'in_progress');
  }

  async performAction(actor: User, taskId: string, action: TaskAction): Promise<TaskActionResult> {
    const task = await this.load(actor, taskId, 'member');
    const patch = applyAction(task, action, this.now());
    if (!patch) throw new ConflictError(actionRefusal(task, action));
    return this.commit(actor, task, patch, action === 'start');
  }

  async deleteTask(actor: User, taskId: string): Promise<void> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError(NOT_FOUND);
    const { membership } = await this.access.require(task.teamId, actor.id, 'viewer', NOT_FOUND);

    const isCreator = task.creatorId === actor.id && roleAtLeast(membership.role, 'member');
    if (!isCreator && !roleAtLeast(membership.role, 'admin')) {
      throw new ForbiddenError('Only the task creator or a team admin can delete this task');
    }
    await this.tasks.update(task.id, { deletedAt: this.now() });
    this.logger.info(`User ${actor.id} deleted task ${task.id}`);
  }

  async listAssignments(actor: User, taskId: string): Promise<TaskAssignment[]> {
    const task = await this.load(actor, taskId, 'viewer');
    return this.tasks.listAssignments([task.id]);
  }

  async assignTask(actor: User, taskId: string, userId: string): Promise<AssignResult> {
    const task = await this.load(actor, taskId, 'member');
    if (!(await this.access.isActiveMember(task.teamId, userId))) throw new BadRequestError(NOT_A_MEMBER);

    const existing = findAssignment(await this.tasks.listAssignments([task.id]), userId);
    if (existing) return { assignment: existing, created: false };

    try {
      const assignment = await this.tasks.createAssignment({
        id: randomUUID(),
        taskId: task.id,
        assigneeId: userId,
        assignedAt: this.now(),
        assignedById: actor.id
      });
      return { assignment, created: true };
    } catch (err) {
      if (!isDuplicateEntryError(err)) throw err;
      const raced = findAssignment(await this.tasks.listAssignments([task.id]), userId);
      if (!raced) throw err;
      return { assignment: raced, created: false };
    }
  }

  async unassignTask(actor: User, taskId: string, userId: string): Promise<void> {
    const task = await this.load(actor, taskId, 'member');
    if (!(await this.tasks.deleteAssignment(task.id, userId))) {
      throw new NotFoundError('Assignment not found');
    }
  }

  async listDependencies(actor: User, taskId: string): Promise<DependencyListing> {
    const task = await this.load(actor, taskId, 'viewer');
    const [prerequisites, dependents] = await Promise.all([
      this.tasks.listDependencies([task.id]),
      this.tasks.listDependents([task.id])
    ]);
    const related = await this.tasks.findByIds([
      ...prerequisites.map((d) => d.prerequisiteTaskId),
      ...dependents.map((d) => d.dependentTaskId)
    ]);
    const byId = new Map<string, Task>([...related.map((t): [string, Task] => [t.id, t]), [task.id, task]]);

    const link = (edge: TaskDependency, otherId: string): DependencyLink[] => {
      const other = byId.get(otherId);
      const prerequisite = byId.get(edge.prerequisiteTaskId);
      if (!other || !prerequisite) return [];
      return [
        {
          ...edge,
          task: { id: other.id, title: other.title, status: other.status },
          isBlocking: !isTaskCompleted(prerequisite.status)
        }
      ];
    };

    return {
      prerequisites: prerequisites.flatMap((d) => link(d, d.prerequisiteTaskId)),
      dependents: dependents.flatMap((d) => link(d, d.dependentTaskId))
    };
  }

  async addDependency(actor: User, taskId: string, prerequisiteTaskId: string): Promise<DependencyResult> {
    const task = await this.load(actor, taskId, 'member');
    if (prerequisiteTaskId === task.id) throw new BadRequestError('Task cannot depend on itself');

    const prerequisite = await this.tasks.findById(prerequisiteTaskId);
    if (!prerequisite) throw new NotFoundError('Prerequisite task not found');
    if (prerequisite.teamId !== task.teamId) throw new BadRequestError('Tasks must belong to the same team');

    const existing = findDependency(await this.tasks.listDependencies([task.id]), prerequisite.id);
    if (existing) return { dependency: existing, created: false };

    const edges = await this.tasks.listTeamDependencies(task.teamId);
    if (wouldCreateCycle(edges, task.id, prerequisite.id)) {
      throw new ConflictError('Dependency would create a cycle');
    }

    try {
      const dependency = await this.tasks.createDependency({
        id: randomUUID(),
        dependentTaskId: task.id,
        prerequisiteTaskId: prerequisite.id,
        createdAt: this.now(),
        createdById: actor.id
      });
      return { dependency, created: true };
    } catch (err) {
      if (!isDuplicateEntryError(err)) throw err;
      const raced = findDependency(await this.tasks.listDependencies([task.id]), prerequisite.id);
      if (!raced) throw err;
      return { dependency: raced, created: false };
    }
  }

  async removeDependency(actor: User, taskId: string, prerequisiteTaskId: string): Promise<void> {
    const task = await this.load(actor, taskId, 'member');
    if (!(await this.tasks.deleteDependency(task.id, prerequisiteTaskId))) {
      throw new NotFoundError('Dependency not found');
    }
  }

  /** Resolves a task the actor may see at `required`; outsiders get a 404. */
  async load(actor: User, taskId: string, required: TeamRole): Promise<Task> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError(NOT_FOUND);
    await this.access.require(task.teamId, actor.id, required, NOT_FOUND);
    return task;
  }

  async view(task: Task): Promise<TaskView> {
    const [view] = await this.views([task]);
    return view;
  }

  /** Decorates tasks with assignment and dependency state in a fixed number of queries. */
  async views(tasks: Task[]): Promise<TaskView[]> {
    const ids = tasks.map((t) => t.id);
    const [assignments, prerequisites, dependents] = await Promise.all([
      this.tasks.listAssignments(ids),
      this.tasks.listDependencies(ids),
      this.tasks.listDependents(ids)
    ]);
    const related = await this.tasks.findByIds([
      ...new Set([
        ...prerequisites.map((d) => d.prerequisiteTaskId),
        ...dependents.map((d) => d.dependentTaskId)
      ])
    ]);
    const statusOf = new Map<string, TaskStatus>(related.map((t) => [t.id, t.status]));
    const tasksFor = (edges: TaskDependency[], otherId: (d: TaskDependency) => string) =>
      edges.flatMap((d) => {
        const status = statusOf.get(otherId(d));
        return status ? [{ status }] : [];
      });

    const now = this.now();
    return tasks.map((task) => ({
      ...task,
      assigneeIds: assignments.filter((a) => a.taskId === task.id).map((a) => a.assigneeId),
      isBlocked: isBlocked(
        tasksFor(
          prerequisites.filter((d) => d.dependentTaskId === task.id),
          (d) => d.prerequisiteTaskId
        )
      ),
      isOverdue: isOverdue(task, now),
      daysUntilDue: daysUntilDue(task, now),
      blockingTasksCount: blockingTasksCount(
        tasksFor(
          dependents.filter((d) => d.prerequisiteTaskId === task.id),
          (d) => d.dependentTaskId
        )
      )
    }));
  }

  private async query(teamIds: string[], query: TaskQuery): Promise<TaskView[]> {
    const { skip = DEFAULT_PAGE.skip, limit = DEFAULT_PAGE.limit, ...filter } = query;
    const tasks = await this.tasks.list({ ...filter, teamIds }, { skip, limit });
    return this.views(tasks);
  }

  private async assertProjectInTeam(projectId: string, teamId: string): Promise<void> {
    const project = await this.projects.findById(projectId);
    if (!project || project.teamId !== teamId) {
      throw new BadRequestError('Project must belong to the same team');
    }
  }

  /** Writes `changes`, claiming an unassigned task for the actor when it is started. */
  private async commit(actor: User, task: Task, changes: TaskPatch, claim: boolean): Promise<TaskActionResult> {
    if (changes.status) await this.assertCanEnter(task, changes.status);

    if (claim) {
      const assignments = await this.tasks.listAssignments([task.id]);
      if (assignments.length === 0) {
        await this.tasks.createAssignment({
          id: randomUUID(),
          taskId: task.id,
          assigneeId: actor.id,
          assignedAt: this.now(),
          assignedById: actor.id
        });
      }
    }

    const updated = await this.tasks.update(task.id, changes);
    if (!updated) throw new NotFoundError(NOT_FOUND);

    const completedNow = isTaskCompleted(updated.status) && !isTaskCompleted(task.status);
    const unblockedTaskIds = completedNow ? await this.unblockedBy(updated.id) : [];
    if (unblockedTaskIds.length > 0) {
      this.logger.info(`Task ${updated.id} unblocked ${unblockedTaskIds.join(', ')}`);
    }
    return { task: await this.view(updated), unblockedTaskIds };
  }

  private async assertCanEnter(task: Task, status: TaskStatus): Promise<void> {
    if (!requiresUnblocked(status)) return;
    const edges = await this.tasks.listDependencies([task.id]);
    const prerequisites = await this.tasks.findByIds(edges.map((d) => d.prerequisiteTaskId));
    if (isBlocked(prerequisites)) throw new ConflictError(BLOCKED);
  }

  /** Incomplete dependents of `taskId` whose prerequisites are now all completed. */
  private async unblockedBy(taskId: string): Promise<string[]> {
    const edges = await this.tasks.listDependents([taskId]);
    const dependents = (await this.tasks.findByIds(edges.map((d) => d.dependentTaskId))).filter(
      (t) => !isTaskCompleted(t.status)
    );
    if (dependents.length === 0) return [];

    const theirEdges = await this.tasks.listDependencies(dependents.map((t) => t.id));
    const prerequisites = await this.tasks.findByIds([
      ...new Set(theirEdges.map((d) => d.prerequisiteTaskId))
    ]);
    const statusOf = new Map(prerequisites.map((t) => [t.id, t.status]));

    return dependents
      .filter((dependent) =>
        theirEdges
          .filter((d) => d.dependentTaskId === dependent.id)
          .every((d) => {
            const status = statusOf.get(d.prerequisiteTaskId);
            return status === undefined || isTaskCompleted(status);
          })
      )
      .map((t) => t.id);
  }
}

function actionRefusal(task: Task, action: TaskAction): string {
  if (action === 'archive') return 'Task is already archived';
  if (action === 'unarchive') return 'Task is not archived';
  return `Cannot ${action} a task with status ${task.status}`;
}

function statusRefusal(task: Task, status: TaskStatus): string {
  if (status === 'in_review') return `Cannot move a task with status ${task.status} to review`;
  return actionRefusal(task, STATUS_ACTIONS[status]);
}
