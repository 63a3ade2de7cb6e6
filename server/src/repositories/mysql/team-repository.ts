import type { Pool } from 'mysql2/promise';
import type {
  MembershipPatch,
  NewTeam,
  NewTeamMembership,
  Team,
  TeamMembership,
  TeamPatch
} from '../../models/types';
import type { TeamRepository } from '../types';
import {
  buildUpdate,
  mapMembershipRow,
  mapTeamRow,
  placeholders,
  type MembershipRow,
  type SqlValue,
  type TeamRow
} from './rows';

const TEAM_COLUMNS: Record<keyof TeamPatch, string> = {
  name: 'name',
  slug: 'slug',
  description: 'description',
  isActive: 'is_active',
  allowPublicSignup: 'allow_public_signup',
  defaultTaskPriority: 'default_task_priority',
  deletedAt: 'deleted_at'
};

const MEMBERSHIP_COLUMNS: Record<keyof MembershipPatch, string> = {
  role: 'role',
  invitedAt: 'invited_at',
  joinedAt: 'joined_at',
  invitedById: 'invited_by_id',
  deletedAt: 'deleted_at'
};

const INSERT_MEMBERSHIP = `INSERT INTO team_memberships
  (id, user_id, team_id, role, invited_at, joined_at, invited_by_id, deleted_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)`;

function membershipValues(m: NewTeamMembership): SqlValue[] {
  return [m.id, m.userId, m.teamId, m.role, m.invitedAt, m.joinedAt, m.invitedById, m.deletedAt];
}

export class MySqlTeamRepository implements TeamRepository {
  constructor(private readonly pool: Pool) {}

  async createWithOwner(
    team: NewTeam,
    owner: NewTeamMembership
  ): Promise<{ team: Team; membership: TeamMembership }> {
    const conn = await this.pool.getConnection();
    try {
      await conn.beginTransaction();
      await conn.query(
        `INSERT INTO teams (id, name, slug, description, is_active, allow_public_signup, default_task_priority, deleted_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          team.id,
          team.name,
          team.slug,
          team.description,
          team.isActive,
          team.allowPublicSignup,
          team.defaultTaskPriority,
          team.deletedAt
        ]
      );
      await conn.query(INSERT_MEMBERSHIP, membershipValues(owner));
      await conn.commit();
    } catch (e) {
      await conn.rollback();
      throw e;
    } finally {
      conn.release();
    }

    const created = await this.findById(team.id);
    const membership = await this.findMembership(team.id, owner.userId);
    if (!created || !membership) {
      throw new Error(`Team ${team.id} missing after insert`);
    }
    return { team: created, membership };
  }

  async findById(id: string): Promise<Team | null> {
    const [rows] = await this.pool.query<TeamRow[]>(
      'SELECT * FROM teams WHERE id = ? AND deleted_at IS NULL',
      [id]
    );
    return rows[0] ? mapTeamRow(rows[0]) : null;
  }

  async findBySlug(slug: string): Promise<Team | null> {
    const [rows] = await this.pool.query<TeamRow[]>('SELECT * FROM teams WHERE slug = ?', [slug]);
    return rows[0] ? mapTeamRow(rows[0]) : null;
  }

  async findByIds(ids: string[]): Promise<Team[]> {
    if (ids.length === 0) return [];
    const [rows] = await this.pool.query<TeamRow[]>(
      `SELECT * FROM teams WHERE id IN ${placeholders(ids.length)} AND deleted_at IS NULL ORDER BY name ASC`,
      ids
    );
    return rows.map(mapTeamRow);
  }

  async update(id: string, patch: TeamPatch): Promise<Team | null> {
    const { sets, vals } = buildUpdate(patch, TEAM_COLUMNS);
    if (sets.length) {
      await this.pool.query(`UPDATE teams SET ${sets.join(', ')} WHERE id = ?`, [...vals, id]);
    }
    return this.findById(id);
  }

  async createMembership(membership: NewTeamMembership): Promise<TeamMembership> {
    await this.pool.query(INSERT_MEMBERSHIP, membershipValues(membership));
    const created = await this.findMembership(membership.teamId, membership.userId);
    if (!created) throw new Error(`Membership ${membership.id} missing after insert`);
    return created;
  }

  async findMembership(teamId: string, userId: string): Promise<TeamMembership | null> {
    const [rows] = await this.pool.query<MembershipRow[]>(
      'SELECT * FROM team_memberships WHERE team_id = ? AND user_id = ?',
      [teamId, userId]
    );
    return rows[0] ? mapMembershipRow(rows[0]) : null;
  }

  async listMemberships(teamId: string): Promise<TeamMembership[]> {
    const [rows] = await this.pool.query<MembershipRow[]>(
      'SELECT * FROM team_memberships WHERE team_id = ? ORDER BY invited_at ASC',
      [teamId]
    );
    return rows.map(mapMembershipRow);
  }

  async listMembershipsForUser(userId: string): Promise<TeamMembership[]> {
    const [rows] = await this.pool.query<MembershipRow[]>(
      'SELECT * FROM team_memberships WHERE user_id = ? ORDER BY invited_at ASC',
      [userId]
    );
    return rows.map(mapMembershipRow);
  }

  async updateMembership(id: string, patch: MembershipPatch): Promise<TeamMembership | null> {
    const { sets, vals } = buildUpdate(patch, MEMBERSHIP_COLUMNS);
    if (sets.length) {
      await this.pool.query(`UPDATE team_memberships SET ${sets.join(', ')} WHERE id = ?`, [
        ...vals,
        id
      ]);
    }
    const [rows] = await this.pool.query<MembershipRow[]>(
      'SELECT * FROM team_memberships WHERE id = ?',
      [id]
    );
    return rows[0] ? mapMembershipRow(rows[0]) : null;
  }
}
