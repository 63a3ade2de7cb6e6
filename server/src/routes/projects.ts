import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler';
import { requireUser } from '../middleware/auth';
import { parse } from '../schemas/common';
import { ProjectActionParam, ProjectUpdateSchema } from '../schemas/project';
import type { ProjectService } from '../services/project-service';

export function createProjectsRouter(projects: ProjectService): Router {
  const router = Router();

  router.get(
    '/:projectId',
    asyncHandler(async (req, res) => {
      res.json(await projects.getProject(requireUser(req), req.params.projectId));
    })
  );

  router.patch(
    '/:projectId',
    asyncHandler(async (req, res) => {
      const patch = parse(ProjectUpdateSchema, req.body);
      res.json(await projects.updateProject(requireUser(req), req.params.projectId, patch));
    })
  );

  router.delete(
    '/:projectId',
    asyncHandler(async (req, res) => {
      await projects.deleteProject(requireUser(req), req.params.projectId);
      res.status(204).end();
    })
  );

  // POST /:projectId/start | complete | cancel | hold | resume
  router.post(
    '/:projectId/:action',
    asyncHandler(async (req, res, next) => {
      const action = ProjectActionParam.safeParse(req.params.action);
      if (!action.success) return next();
      res.json(await projects.transitionProject(requireUser(req), req.params.projectId, action.data));
    })
  );

  return router;
}
