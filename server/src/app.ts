import express, { type Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import type { Config } from './config';
import type { Queryable } from './db/pool';
import { createErrorHandler, notFoundHandler } from './errors';
import type { Logger } from './logger';
import { accessLog } from './middleware/access-log';
import { createAuthMiddleware } from './middleware/auth';
import type { Repositories } from './repositories/types';
import { createAuthRouter } from './routes/auth';
import { createHealthRouter, type ServiceInfo } from './routes/health';
import { createProjectsRouter } from './routes/projects';
import { createTasksRouter } from './routes/tasks';
import { createTeamsRouter } from './routes/teams';
import { createUsersRouter } from './routes/users';
import { AuthService } from './services/auth-service';
import { ProjectService } from './services/project-service';
import { TaskService } from './services/task-service';
import { TeamService } from './services/team-service';
import { UserService } from './services/user-service';
import { utcNow } from './utils/dates';

export const SERVICE_INFO: ServiceInfo = { name: 'Team Task API', version: '1.0.0' };

export interface Services {
  auth: AuthService;
  users: UserService;
  teams: TeamService;
  projects: ProjectService;
  tasks: TaskService;
}

export function createServices(
  repos: Repositories,
  config: Config,
  logger: Logger,
  now: () => Date = utcNow
): Services {
  const auth = new AuthService(
    repos.users,
    {
      secretKey: config.secretKey,
      algorithm: config.jwtAlgorithm,
      accessTokenExpireMinutes: config.accessTokenExpireMinutes,
      refreshTokenExpireDays: config.refreshTokenExpireDays,
      bcryptRounds: config.bcryptRounds
    },
    logger.child('auth'),
    now
  );
  return {
    auth,
    users: new UserService(repos.users, auth, logger.child('users'), now),
    teams: new TeamService(repos.teams, repos.users, logger.child('teams'), now),
    projects: new ProjectService(repos.projects, repos.tasks, repos.teams, logger.child('projects'), now),
    tasks: new TaskService(repos.tasks, repos.projects, repos.teams, logger.child('tasks'), now)
  };
}

export interface AppDeps {
  config: Config;
  logger: Logger;
  db: Queryable;
  services: Services;
}

export function createApp({ config, logger, db, services }: AppDeps): Express {
  const app = express();
  const authenticate = createAuthMiddleware(services.auth);

  app.use(cors({ origin: config.allowedOrigins, credentials: true }));
  app.use(compression());
  app.use(express.json());
  app.use(accessLog(logger.child('http')));

  app.use(createHealthRouter(db, config, SERVICE_INFO));
  app.use('/api/v1/auth', createAuthRouter(services.auth, services.users));
  app.use('/api/v1/users', authenticate, createUsersRouter(services.users, services.teams, services.tasks));
  app.use('/api/v1/teams', authenticate, createTeamsRouter(services.teams, services.projects, services.tasks));
  app.use('/api/v1/projects', authenticate, createProjectsRouter(services.projects));
  app.use('/api/v1/tasks', authenticate, createTasksRouter(services.tasks));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger, { exposeErrors: config.debug }));

  return app;
}
