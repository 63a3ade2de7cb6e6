import { randomUUID } from 'crypto';
import { BadRequestError, ConflictError, NotFoundError, isDuplicateEntryError } from '../errors';
import type { Logger } from '../logger';
import type { TeamRole } from '../models/enums';
import {
  completedTasks,
  completionPercentage,
  daysRemaining,
  durationDays,
  isOverdue,
  transition,
  validateTimeline,
  type ProjectAction
} from '../models/project';
import type { Project, ProjectPatch, User } from '../models/types';
import type { ProjectFilter, ProjectRepository, TaskRepository, TeamRepository } from '../repositories/types';
import type { ProjectCreateInput, ProjectUpdateInput } from '../schemas/project';
import { utcNow } from '../utils/dates';
import { TeamAccess } from './access';

export interface ProjectView extends Project {
  taskCount: number;
  completedTaskCount: number;
  completionPercentage: number;
  isOverdue: boolean;
  durationDays: number | null;
  daysRemaining: number | null;
}

const DUPLICATE_NAME = 'A project with this name already exists in the team';
const BAD_TIMELINE = 'Project start date must be on or before its end date';
const NOT_FOUND = 'Project not found';

export class ProjectService {
  private readonly access: TeamAccess;

  constructor(
    private readonly projects: ProjectRepository,
    private readonly tasks: TaskRepository,
    teams: TeamRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = utcNow
  ) {
    this.access = new TeamAccess(teams);
  }

  async createProject(actor: User, teamId: string, data: ProjectCreateInput): Promise<ProjectView> {
    await this.access.require(teamId, actor.id, 'member');

    const startDate = data.startDate ?? null;
    const endDate = data.endDate ?? null;
    if (!validateTimeline({ startDate, endDate })) throw new BadRequestError(BAD_TIMELINE);
    if (await this.projects.findByName(teamId, data.name)) throw new ConflictError(DUPLICATE_NAME);

    try {
      const project = await this.projects.create({
        id: randomUUID(),
        teamId,
        name: data.name,
        description: data.description ?? null,
        status: data.status,
        startDate,
        endDate,
        isActive: true,
        color: data.color ?? null,
        position: data.position,
        estimatedHours: data.estimatedHours ?? null,
        deletedAt: null
      });
      this.logger.info(`User ${actor.id} created project ${project.id} in team ${teamId}`);
      return this.view(project);
    } catch (err) {
      if (isDuplicateEntryError(err)) throw new ConflictError(DUPLICATE_NAME);
      throw err;
    }
  }

  async listProjects(actor: User, teamId: string, filter: ProjectFilter = {}): Promise<ProjectView[]> {
    await this.access.require(teamId, actor.id, 'viewer');
    const projects = await this.projects.listByTeam(teamId, filter);
    return Promise.all(projects.map((p) => this.view(p)));
  }

  async getProject(actor: User, projectId: string): Promise<ProjectView> {
    const project = await this.load(actor, projectId, 'viewer');
    return this.view(project);
  }

  async updateProject(actor: User, projectId: string, patch: ProjectUpdateInput): Promise<ProjectView> {
    const project = await this.load(actor, projectId, 'member');

    const merged = {
      startDate: patch.startDate === undefined ? project.startDate : patch.startDate,
      endDate: patch.endDate === undefined ? project.endDate : patch.endDate
    };
    if (!validateTimeline(merged)) throw new BadRequestError(BAD_TIMELINE);

    if (patch.name !== undefined && patch.name !== project.name) {
      if (await this.projects.findByName(project.teamId, patch.name)) {
        throw new ConflictError(DUPLICATE_NAME);
      }
    }

    return this.save(project.id, {
      name: patch.name,
      description: patch.description,
      startDate: patch.startDate,
      endDate: patch.endDate,
      isActive: patch.isActive,
      color: patch.color,
      position: patch.position,
      estimatedHours: patch.estimatedHours
    });
  }

  async transitionProject(actor: User, projectId: string, action: ProjectAction): Promise<ProjectView> {
    const project = await this.load(actor, projectId, 'member');
    const patch = transition(project, action, this.now());
    this.logger.debug(`Project ${project.id}: ${action}`);
    return this.save(project.id, patch);
  }

  async deleteProject(actor: User, projectId: string): Promise<void> {
    const project = await this.load(actor, projectId, 'admin');
    await this.projects.update(project.id, { isActive: false, deletedAt: this.now() });
    this.logger.info(`User ${actor.id} deleted project ${project.id}`);
  }

  /** Resolves a project the actor may see at `required`; outsiders get a 404. */
  async load(actor: User, projectId: string, required: TeamRole): Promise<Project> {
    const project = await this.projects.findById(projectId);
    if (!project) throw new NotFoundError(NOT_FOUND);
    await this.access.require(project.teamId, actor.id, required, NOT_FOUND);
    return project;
  }

  private async save(projectId: string, patch: ProjectPatch): Promise<ProjectView> {
    try {
      const updated = await this.projects.update(projectId, patch);
      if (!updated) throw new NotFoundError(NOT_FOUND);
      return this.view(updated);
    } catch (err) {
      if (isDuplicateEntryError(err)) throw new ConflictError(DUPLICATE_NAME);
      throw err;
    }
  }

  private async view(project: Project): Promise<ProjectView> {
    const tasks = await this.tasks.listByProject(project.id);
    const now = this.now();
    return {
      ...project,
      taskCount: tasks.length,
      completedTaskCount: completedTasks(tasks).length,
      completionPercentage: completionPercentage(tasks),
      isOverdue: isOverdue(project, now),
      durationDays: durationDays(project),
      daysRemaining: daysRemaining(project, now)
    };
  }
}
