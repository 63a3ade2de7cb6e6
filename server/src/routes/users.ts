import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler';
import { requireUser } from '../middleware/auth';
import { parse } from '../schemas/common';
import { toUserResponse } from '../schemas/responses';
import { TaskListQuery } from '../schemas/task';
import { ChangePasswordSchema, UserUpdateSchema } from '../schemas/user';
import type { TaskService } from '../services/task-service';
import type { TeamService } from '../services/team-service';
import type { UserService } from '../services/user-service';

export function createUsersRouter(users: UserService, teams: TeamService, tasks: TaskService): Router {
  const router = Router();

  router.get(
    '/me',
    asyncHandler(async (req, res) => {
      res.json(toUserResponse(requireUser(req)));
    })
  );

  router.patch(
    '/me',
    asyncHandler(async (req, res) => {
      const updated = await users.updateProfile(requireUser(req).id, parse(UserUpdateSchema, req.body));
      res.json(toUserResponse(updated));
    })
  );

  router.delete(
    '/me',
    asyncHandler(async (req, res) => {
      await users.deactivate(requireUser(req).id);
      res.status(204).end();
    })
  );

  router.post(
    '/me/password',
    asyncHandler(async (req, res) => {
      const { currentPassword, newPassword } = parse(ChangePasswordSchema, req.body);
      await users.changePassword(requireUser(req).id, currentPassword, newPassword);
      res.status(204).end();
    })
  );

  router.get(
    '/me/tasks',
    asyncHandler(async (req, res) => {
      res.json(await tasks.listMyTasks(requireUser(req), parse(TaskListQuery, req.query)));
    })
  );

  router.get(
    '/me/invitations',
    asyncHandler(async (req, res) => {
      res.json(await teams.listInvitations(requireUser(req)));
    })
  );

  return router;
}
