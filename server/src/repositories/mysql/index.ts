import type { Pool } from 'mysql2/promise';
import type { Repositories } from '../types';
import { MySqlProjectRepository } from './project-repository';
import { MySqlTaskRepository } from './task-repository';
import { MySqlTeamRepository } from './team-repository';
import { MySqlUserRepository } from './user-repository';

export function createMySqlRepositories(pool: Pool): Repositories {
  return {
    users: new MySqlUserRepository(pool),
    teams: new MySqlTeamRepository(pool),
    projects: new MySqlProjectRepository(pool),
    tasks: new MySqlTaskRepository(pool)
  };
}
