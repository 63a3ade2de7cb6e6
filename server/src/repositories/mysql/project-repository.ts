import type { Pool } from 'mysql2/promise';
import type { NewProject, Project, ProjectPatch } from '../../models/types';
import type { ProjectFilter, ProjectRepository } from '../types';
import { buildUpdate, mapProjectRow, type ProjectRow, type SqlValue } from './rows';

const PROJECT_COLUMNS: Record<keyof ProjectPatch, string> = {
  name: 'name',
  description: 'description',
  status: 'status',
  startDate: 'start_date',
  endDate: 'end_date',
  isActive: 'is_active',
  color: 'color',
  position: 'position',
  estimatedHours: 'estimated_hours',
  deletedAt: 'deleted_at'
};

export class MySqlProjectRepository implements ProjectRepository {
  constructor(private readonly pool: Pool) {}

  async create(p: NewProject): Promise<Project> {
    await this.pool.query(
      `INSERT INTO projects
         (id, team_id, name, description, status, start_date, end_date, is_active, color, position, estimated_hours, deleted_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        p.id,
        p.teamId,
        p.name,
        p.description,
        p.status,
        p.startDate,
        p.endDate,
        p.isActive,
        p.color,
        p.position,
        p.estimatedHours,
        p.deletedAt
      ]
    );
    const created = await this.findById(p.id);
    if (!created) throw new Error(`Project ${p.id} missing after insert`);
    return created;
  }

  async findById(id: string): Promise<Project | null> {
    const [rows] = await this.pool.query<ProjectRow[]>(
      'SELECT * FROM projects WHERE id = ? AND deleted_at IS NULL',
      [id]
    );
    return rows[0] ? mapProjectRow(rows[0]) : null;
  }

  async findByName(teamId: string, name: string): Promise<Project | null> {
    const [rows] = await this.pool.query<ProjectRow[]>(
      'SELECT * FROM projects WHERE team_id = ? AND name = ?',
      [teamId, name]
    );
    return rows[0] ? mapProjectRow(rows[0]) : null;
  }

  async listByTeam(teamId: string, filter: ProjectFilter = {}): Promise<Project[]> {
    const where = ['team_id = ?', 'deleted_at IS NULL'];
    const vals: SqlValue[] = [teamId];
    if (filter.status) {
      where.push('status = ?');
      vals.push(filter.status);
    }
    if (!filter.includeInactive) {
      where.push('is_active = 1');
    }
    const [rows] = await this.pool.query<ProjectRow[]>(
      `SELECT * FROM projects WHERE ${where.join(' AND ')} ORDER BY position ASC, created_at ASC`,
      vals
    );
    return rows.map(mapProjectRow);
  }

  async update(id: string, patch: ProjectPatch): Promise<Project | null> {
    const { sets, vals } = buildUpdate(patch, PROJECT_COLUMNS);
    if (sets.length) {
      await this.pool.query(`UPDATE projects SET ${sets.join(', ')} WHERE id = ?`, [...vals, id]);
    }
    return this.findById(id);
  }
}
