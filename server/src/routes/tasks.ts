import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler';
import { requireUser } from '../middleware/auth';
import { parse } from '../schemas/common';
import { AssignSchema, DependencySchema, TaskActionParam, TaskUpdateSchema } from '../schemas/task';
import type { TaskService } from '../services/task-service';

export function createTasksRouter(tasks: TaskService): Router {
  const router = Router();

  router.get(
    '/:taskId',
    asyncHandler(async (req, res) => {
      res.json(await tasks.getTask(requireUser(req), req.params.taskId));
    })
  );

  router.patch(
    '/:taskId',
    asyncHandler(async (req, res) => {
      const patch = parse(TaskUpdateSchema, req.body);
      res.json(await tasks.updateTask(requireUser(req), req.params.taskId, patch));
    })
  );

  router.delete(
    '/:taskId',
    asyncHandler(async (req, res) => {
      await tasks.deleteTask(requireUser(req), req.params.taskId);
      res.status(204).end();
    })
  );

  // Assignments

  router.get(
    '/:taskId/assignments',
    asyncHandler(async (req, res) => {
      res.json(await tasks.listAssignments(requireUser(req), req.params.taskId));
    })
  );

  router.post(
    '/:taskId/assignments',
    asyncHandler(async (req, res) => {
      const { userId } = parse(AssignSchema, req.body);
      const { assignment, created } = await tasks.assignTask(requireUser(req), req.params.taskId, userId);
      res.status(created ? 201 : 200).json(assignment);
    })
  );

  router.delete(
    '/:taskId/assignments/:userId',
    asyncHandler(async (req, res) => {
      await tasks.unassignTask(requireUser(req), req.params.taskId, req.params.userId);
      res.status(204).end();
    })
  );

  // Dependencies

  router.get(
    '/:taskId/dependencies',
    asyncHandler(async (req, res) => {
      res.json(await tasks.listDependencies(requireUser(req), req.params.taskId));
    })
  );

  router.post(
    '/:taskId/dependencies',
    asyncHandler(async (req, res) => {
      const { prerequisiteTaskId } = parse(DependencySchema, req.body);
      const { dependency, created } = await tasks.addDependency(
        requireUser(req),
        req.params.taskId,
        prerequisiteTaskId
      );
      res.status(created ? 201 : 200).json(dependency);
    })
  );

  router.delete(
    '/:taskId/dependencies/:prerequisiteTaskId',
    asyncHandler(async (req, res) => {
      await tasks.removeDependency(requireUser(req), req.params.taskId, req.params.prerequisiteTaskId);
      res.status(204).end();
    })
  );

  // POST /:taskId/start | complete | cancel | reopen | archive | unarchive
  router.post(
    '/:taskId/:action',
    asyncHandler(async (req, res, next) => {
      const action = TaskActionParam.safeParse(req.params.action);
      if (!action.success) return next();
      res.json(await tasks.performAction(requireUser(req), req.params.taskId, action.data));
    })
  );

  return router;
}
