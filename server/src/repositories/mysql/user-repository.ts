import type { Pool } from 'mysql2/promise';
import type { NewUser, User, UserPatch } from '../../models/types';
import type { UserRepository } from '../types';
import { buildUpdate, mapUserRow, placeholders, type UserRow } from './rows';

const USER_COLUMNS: Record<keyof UserPatch, string> = {
  email: 'email',
  hashedPassword: 'hashed_password',
  firstName: 'first_name',
  lastName: 'last_name',
  timezone: 'timezone',
  isActive: 'is_active',
  isVerified: 'is_verified',
  lastLoginAt: 'last_login_at',
  deletedAt: 'deleted_at'
};

export class MySqlUserRepository implements UserRepository {
  constructor(private readonly pool: Pool) {}

  async create(user: NewUser): Promise<User> {
    await this.pool.query(
      `INSERT INTO users
         (id, email, hashed_password, first_name, last_name, timezone, is_active, is_verified, last_login_at, deleted_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        user.id,
        user.email,
        user.hashedPassword,
        user.firstName,
        user.lastName,
        user.timezone,
        user.isActive,
        user.isVerified,
        user.lastLoginAt,
        user.deletedAt
      ]
    );
    return this.require(user.id);
  }

  async findById(id: string): Promise<User | null> {
    const [rows] = await this.pool.query<UserRow[]>('SELECT * FROM users WHERE id = ?', [id]);
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [rows] = await this.pool.query<UserRow[]>(
      'SELECT * FROM users WHERE LOWER(email) = LOWER(?)',
      [email]
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findByIds(ids: string[]): Promise<User[]> {
    if (ids.length === 0) return [];
    const [rows] = await this.pool.query<UserRow[]>(
      `SELECT * FROM users WHERE id IN ${placeholders(ids.length)}`,
      ids
    );
    return rows.map(mapUserRow);
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    const { sets, vals } = buildUpdate(patch, USER_COLUMNS);
    if (sets.length) {
      await this.pool.query(`UPDATE users SET ${sets.join(', ')} WHERE id = ?`, [...vals, id]);
    }
    return this.findById(id);
  }

  private async require(id: string): Promise<User> {
    const user = await this.findById(id);
    if (!user) throw new Error(`User ${id} missing after insert`);
    return user;
  }
}
