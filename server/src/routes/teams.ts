import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler';
import { requireUser } from '../middleware/auth';
import { parse } from '../schemas/common';
import { ProjectCreateSchema, ProjectListQuery } from '../schemas/project';
import { TaskCreateSchema, TaskListQuery } from '../schemas/task';
import {
  InviteSchema,
  MemberListQuery,
  RoleChangeSchema,
  TeamCreateSchema,
  TeamUpdateSchema
} from '../schemas/team';
import type { ProjectService } from '../services/project-service';
import type { TaskService } from '../services/task-service';
import type { TeamService } from '../services/team-service';

export function createTeamsRouter(teams: TeamService, projects: ProjectService, tasks: TaskService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      res.json(await teams.listTeams(requireUser(req)));
    })
  );

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const team = await teams.createTeam(requireUser(req), parse(TeamCreateSchema, req.body));
      res.status(201).json(team);
    })
  );

  router.get(
    '/:teamId',
    asyncHandler(async (req, res) => {
      res.json(await teams.getTeam(requireUser(req), req.params.teamId));
    })
  );

  router.patch(
    '/:teamId',
    asyncHandler(async (req, res) => {
      const patch = parse(TeamUpdateSchema, req.body);
      res.json(await teams.updateTeam(requireUser(req), req.params.teamId, patch));
    })
  );

  router.delete(
    '/:teamId',
    asyncHandler(async (req, res) => {
      await teams.deleteTeam(requireUser(req), req.params.teamId);
      res.status(204).end();
    })
  );

  router.post(
    '/:teamId/join',
    asyncHandler(async (req, res) => {
      res.status(201).json(await teams.joinTeam(requireUser(req), req.params.teamId));
    })
  );

  // Members and invitations

  router.get(
    '/:teamId/members',
    asyncHandler(async (req, res) => {
      const { includePending } = parse(MemberListQuery, req.query);
      res.json(await teams.listMembers(requireUser(req), req.params.teamId, includePending));
    })
  );

  router.post(
    '/:teamId/members',
    asyncHandler(async (req, res) => {
      const invite = parse(InviteSchema, req.body);
      res.status(201).json(await teams.inviteMember(requireUser(req), req.params.teamId, invite));
    })
  );

  router.patch(
    '/:teamId/members/:userId',
    asyncHandler(async (req, res) => {
      const { role } = parse(RoleChangeSchema, req.body);
      res.json(await teams.changeMemberRole(requireUser(req), req.params.teamId, req.params.userId, role));
    })
  );

  router.delete(
    '/:teamId/members/:userId',
    asyncHandler(async (req, res) => {
      await teams.removeMember(requireUser(req), req.params.teamId, req.params.userId);
      res.status(204).end();
    })
  );

  router.post(
    '/:teamId/invitation',
    asyncHandler(async (req, res) => {
      res.json(await teams.acceptInvitation(requireUser(req), req.params.teamId));
    })
  );

  router.delete(
    '/:teamId/invitation',
    asyncHandler(async (req, res) => {
      await teams.declineInvitation(requireUser(req), req.params.teamId);
      res.status(204).end();
    })
  );

  // Team-scoped collections

  router.get(
    '/:teamId/projects',
    asyncHandler(async (req, res) => {
      const filter = parse(ProjectListQuery, req.query);
      res.json(await projects.listProjects(requireUser(req), req.params.teamId, filter));
    })
  );

  router.post(
    '/:teamId/projects',
    asyncHandler(async (req, res) => {
      const data = parse(ProjectCreateSchema, req.body);
      res.status(201).json(await projects.createProject(requireUser(req), req.params.teamId, data));
    })
  );

  router.get(
    '/:teamId/tasks',
    asyncHandler(async (req, res) => {
      const query = parse(TaskListQuery, req.query);
      res.json(await tasks.listTasks(requireUser(req), req.params.teamId, query));
    })
  );

  router.post(
    '/:teamId/tasks',
    asyncHandler(async (req, res) => {
      const data = parse(TaskCreateSchema, req.body);
      res.status(201).json(await tasks.createTask(requireUser(req), req.params.teamId, data));
    })
  );

  return router;
}
