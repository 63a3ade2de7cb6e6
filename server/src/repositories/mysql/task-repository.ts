import type { Pool, ResultSetHeader } from 'mysql2/promise';
import type { NewTask, Task, TaskAssignment, TaskDependency, TaskPatch } from '../../models/types';
import type { Page, TaskFilter, TaskRepository } from '../types';
import {
  buildUpdate,
  mapAssignmentRow,
  mapDependencyRow,
  mapTaskRow,
  placeholders,
  type AssignmentRow,
  type DependencyRow,
  type SqlValue,
  type TaskRow
} from './rows';

const TASK_COLUMNS: Record<keyof TaskPatch, string> = {
  projectId: 'project_id',
  title: 'title',
  description: 'description',
  status: 'status',
  priority: 'priority',
  dueDate: 'due_date',
  startedAt: 'started_at',
  completedAt: 'completed_at',
  position: 'position',
  estimatedHours: 'estimated_hours',
  actualHours: 'actual_hours',
  isArchived: 'is_archived',
  deletedAt: 'deleted_at'
};

export class MySqlTaskRepository implements TaskRepository {
  constructor(private readonly pool: Pool) {}

  async create(t: NewTask): Promise<Task> {
    await this.pool.query(
      `INSERT INTO tasks
         (id, team_id, creator_id, project_id, title, description, status, priority, due_date,
          started_at, completed_at, position, estimated_hours, actual_hours, is_archived, deleted_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        t.id,
        t.teamId,
        t.creatorId,
        t.projectId,
        t.title,
        t.description,
        t.status,
        t.priority,
        t.dueDate,
        t.startedAt,
        t.completedAt,
        t.position,
        t.estimatedHours,
        t.actualHours,
        t.isArchived,
        t.deletedAt
      ]
    );
    const created = await this.findById(t.id);
    if (!created) throw new Error(`Task ${t.id} missing after insert`);
    return created;
  }

  async findById(id: string): Promise<Task | null> {
    const [rows] = await this.pool.query<TaskRow[]>(
      'SELECT * FROM tasks WHERE id = ? AND deleted_at IS NULL',
      [id]
    );
    return rows[0] ? mapTaskRow(rows[0]) : null;
  }

  async findByIds(ids: string[]): Promise<Task[]> {
    if (ids.length === 0) return [];
    const [rows] = await this.pool.query<TaskRow[]>(
      `SELECT * FROM tasks WHERE id IN ${placeholders(ids.length)} AND deleted_at IS NULL`,
      ids
    );
    return rows.map(mapTaskRow);
  }

  async list(filter: TaskFilter, page: Page): Promise<Task[]> {
    if (filter.teamIds.length === 0) return [];
    const where = [`t.team_id IN ${placeholders(filter.teamIds.length)}`, 't.deleted_at IS NULL'];
    const vals: SqlValue[] = [...filter.teamIds];
    if (filter.projectId) {
      where.push('t.project_id = ?');
      vals.push(filter.projectId);
    }
    if (filter.status) {
      where.push('t.status = ?');
      vals.push(filter.status);
    }
    if (filter.priority) {
      where.push('t.priority = ?');
      vals.push(filter.priority);
    }
    if (filter.assigneeId) {
      where.push('EXISTS (SELECT 1 FROM task_assignments a WHERE a.task_id = t.id AND a.assignee_id = ?)');
      vals.push(filter.assigneeId);
    }
    if (!filter.includeArchived) {
      where.push('t.is_archived = 0');
    }
    const [rows] = await this.pool.query<TaskRow[]>(
      `SELECT t.* FROM tasks t WHERE ${where.join(' AND ')}
       ORDER BY t.position ASC, t.created_at ASC
       LIMIT ? OFFSET ?`,
      [...vals, page.limit, page.skip]
    );
    return rows.map(mapTaskRow);
  }

  async listByProject(projectId: string): Promise<Task[]> {
    const [rows] = await this.pool.query<TaskRow[]>(
      `SELECT * FROM tasks WHERE project_id = ? AND deleted_at IS NULL
       ORDER BY position ASC, created_at ASC`,
      [projectId]
    );
    return rows.map(mapTaskRow);
  }

  async update(id: string, patch: TaskPatch): Promise<Task | null> {
    const { sets, vals } = buildUpdate(patch, TASK_COLUMNS);
    if (sets.length) {
      await this.pool.query(`UPDATE tasks SET ${sets.join(', ')} WHERE id = ?`, [...vals, id]);
    }
    return this.findById(id);
  }

  async listAssignments(taskIds: string[]): Promise<TaskAssignment[]> {
    if (taskIds.length === 0) return [];
    const [rows] = await this.pool.query<AssignmentRow[]>(
      `SELECT * FROM task_assignments WHERE task_id IN ${placeholders(taskIds.length)}
       ORDER BY assigned_at ASC`,
      taskIds
    );
    return rows.map(mapAssignmentRow);
  }

  async createAssignment(a: TaskAssignment): Promise<TaskAssignment> {
    await this.pool.query(
      `INSERT INTO task_assignments (id, task_id, assignee_id, assigned_at, assigned_by_id)
       VALUES (?, ?, ?, ?, ?)`,
      [a.id, a.taskId, a.assigneeId, a.assignedAt, a.assignedById]
    );
    return a;
  }

  async deleteAssignment(taskId: string, assigneeId: string): Promise<boolean> {
    const [result] = await this.pool.query<ResultSetHeader>(
      'DELETE FROM task_assignments WHERE task_id = ? AND assignee_id = ?',
      [taskId, assigneeId]
    );
    return result.affectedRows > 0;
  }

  async listDependencies(taskIds: string[]): Promise<TaskDependency[]> {
    if (taskIds.length === 0) return [];
    const [rows] = await this.pool.query<DependencyRow[]>(
      `SELECT * FROM task_dependencies WHERE dependent_task_id IN ${placeholders(taskIds.length)}
       ORDER BY created_at ASC`,
      taskIds
    );
    return rows.map(mapDependencyRow);
  }

  async listDependents(taskIds: string[]): Promise<TaskDependency[]> {
    if (taskIds.length === 0) return [];
    const [rows] = await this.pool.query<DependencyRow[]>(
      `SELECT * FROM task_dependencies WHERE prerequisite_task_id IN ${placeholders(taskIds.length)}
       ORDER BY created_at ASC`,
      taskIds
    );
    return rows.map(mapDependencyRow);
  }

  async listTeamDependencies(teamId: string): Promise<TaskDependency[]> {
    const [rows] = await this.pool.query<DependencyRow[]>(
      `SELECT d.* FROM task_dependencies d
       JOIN tasks t ON t.id = d.dependent_task_id
       WHERE t.team_id = ? AND t.deleted_at IS NULL`,
      [teamId]
    );
    return rows.map(mapDependencyRow);
  }

  async createDependency(d: TaskDependency): Promise<TaskDependency> {
    await this.pool.query(
      `INSERT INTO task_dependencies (id, dependent_task_id, prerequisite_task_id, created_at, created_by_id)
       VALUES (?, ?, ?, ?, ?)`,
      [d.id, d.dependentTaskId, d.prerequisiteTaskId, d.createdAt, d.createdById]
    );
    return d;
  }

  async deleteDependency(dependentTaskId: string, prerequisiteTaskId: string): Promise<boolean> {
    const [result] = await this.pool.query<ResultSetHeader>(
      'DELETE FROM task_dependencies WHERE dependent_task_id = ? AND prerequisite_task_id = ?',
      [dependentTaskId, prerequisiteTaskId]
    );
    return result.affectedRows > 0;
  }
}
