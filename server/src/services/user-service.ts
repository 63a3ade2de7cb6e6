import { randomUUID } from 'crypto';
import { BadRequestError, ConflictError, NotFoundError } from '../errors';
import type { Logger } from '../logger';
import { deactivate } from '../models/user';
import type { User } from '../models/types';
import type { UserRepository } from '../repositories/types';
import type { RegisterInput } from '../schemas/auth';
import type { UserUpdateInput } from '../schemas/user';
import type { AuthService } from './auth-service';
import { utcNow } from '../utils/dates';

export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly auth: AuthService,
    private readonly logger: Logger,
    private readonly now: () => Date = utcNow
  ) {}

  async register(data: RegisterInput): Promise<User> {
    const email = data.email.toLowerCase();
    if (await this.users.findByEmail(email)) {
      throw new ConflictError('Email already registered');
    }
    const user = await this.users.create({
      id: randomUUID(),
      email,
      hashedPassword: await this.auth.hashPassword(data.password),
      firstName: data.firstName,
      lastName: data.lastName,
      timezone: data.timezone,
      isActive: true,
      isVerified: false,
      lastLoginAt: null,
      deletedAt: null
    });
    this.logger.info(`Registered user ${user.id}`);
    return user;
  }

  async getById(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError('User not found');
    return user;
  }

  async updateProfile(userId: string, patch: UserUpdateInput): Promise<User> {
    const user = await this.getById(userId);
    if (patch.email !== undefined && patch.email.toLowerCase() !== user.email) {
      const owner = await this.users.findByEmail(patch.email);
      if (owner && owner.id !== user.id) throw new ConflictError('Email already registered');
    }
    const updated = await this.users.update(user.id, {
      email: patch.email?.toLowerCase(),
      firstName: patch.firstName,
      lastName: patch.lastName,
      timezone: patch.timezone
    });
    if (!updated) throw new NotFoundError('User not found');
    return updated;
  }

  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.getById(userId);
    if (!(await this.auth.verifyPassword(currentPassword, user.hashedPassword))) {
      throw new BadRequestError('Current password is incorrect');
    }
    await this.users.update(user.id, { hashedPassword: await this.auth.hashPassword(newPassword) });
    this.logger.info(`User ${user.id} changed password`);
  }

  async deactivate(userId: string): Promise<void> {
    const user = await this.getById(userId);
    await this.users.update(user.id, deactivate(this.now()));
    this.logger.info(`Deactivated user ${user.id}`);
  }
}
