import { beforeEach, describe, it, expect } from 'vitest';
import { addMember, createTeam, createTestContext, createUser, type TestContext } from '../../__tests__/support/context';
import type { Team, User } from '../../models/types';
import type { TaskCreateInput } from '../../schemas/task';
import type { TaskQuery, TaskView } from '../task-service';

function taskInput(title: string, overrides: Partial<TaskCreateInput> = {}): TaskCreateInput {
  return { title, position: 0, assigneeIds: [], ...overrides };
}

describe('TaskService', () => {
  let ctx: TestContext;
  let owner: User;
  let member: User;
  let viewer: User;
  let team: Team;

  const create = (title: string, overrides: Partial<TaskCreateInput> = {}): Promise<TaskView> =>
    ctx.services.tasks.createTask(owner, team.id, taskInput(title, overrides));

  beforeEach(async () => {
    ctx = createTestContext();
    owner = await createUser(ctx, 'Owner');
    member = await createUser(ctx, 'Member');
    viewer = await createUser(ctx, 'Viewer');
    team = await ctx.services.teams.createTeam(owner, {
      name: 'Delivery',
      allowPublicSignup: false,
      defaultTaskPriority: 'high'
    });
    await addMember(ctx, team, owner, member, 'member');
    await addMember(ctx, team, owner, viewer, 'viewer');
  });

  describe('createTask', () => {
    it('defaults status and the team priority', async () => {
      const task = await create('Write outline');
      expect(task).toMatchObject({
        teamId: team.id,
        creatorId: owner.id,
        status: 'todo',
        priority: 'high',
        isArchived: false,
        assigneeIds: [],
        isBlocked: false,
        blockingTasksCount: 0,
        daysUntilDue: null
      });
    });

    it('assigns initial assignees once each', async () => {
      const task = await create('Pair up', { assigneeIds: [member.id, member.id, owner.id] });
      expect(task.assigneeIds).toEqual([member.id, owner.id]);
    });

    it('refuses assignees outside the team', async () => {
      const outsider = await createUser(ctx, 'Outsider');
      await expect(create('Nope', { assigneeIds: [outsider.id] })).rejects.toMatchObject({
        status: 400,
        message: 'Assignee must be an active team member'
      });
    });

    it('requires the project to belong to the team', async () => {
      const other = await createTeam(ctx, owner, 'Elsewhere');
      const project = await ctx.services.projects.createProject(owner, other.id, {
        name: 'Foreign',
        status: 'planning',
        position: 0
      });
      await expect(create('Cross team', { projectId: project.id })).rejects.toMatchObject({
        status: 400,
        message: 'Project must belong to the same team'
      });
    });

    it('is closed to viewers', async () => {
      await expect(ctx.services.tasks.createTask(viewer, team.id, taskInput('Read only'))).rejects.toMatchObject({
        status: 403
      });
    });
  });

  describe('listing', () => {
    it('orders by position and applies filters', async () => {
      const b = await create('B', { position: 2, priority: 'low' });
      const a = await create('A', { position: 1, assigneeIds: [member.id] });
      const c = await create('C', { position: 3 });
      await ctx.services.tasks.performAction(owner, c.id, 'archive');

      const ids = async (query: TaskQuery = {}) => (await ctx.services.tasks.listTasks(viewer, team.id, query)).map((t) => t.id);

      expect(await ids()).toEqual([a.id, b.id]);
      expect(await ids({ includeArchived: true })).toEqual([a.id, b.id, c.id]);
      expect(await ids({ priority: 'low' })).toEqual([b.id]);
      expect(await ids({ assigneeId: member.id })).toEqual([a.id]);
      expect(await ids({ skip: 1, limit: 1 })).toEqual([b.id]);
    });

    it('lists my tasks across active teams', async () => {
      const mine = await create('Mine', { assigneeIds: [member.id] });
      await create('Not mine', { assigneeIds: [owner.id] });
      const otherTeam = await createTeam(ctx, member, 'Side');
      const side = await ctx.services.tasks.createTask(member, otherTeam.id, taskInput('Side', { assigneeIds: [member.id] }));

      const tasks = await ctx.services.tasks.listMyTasks(member);
      expect(tasks.map((t) => t.id).sort()).toEqual([mine.id, side.id].sort());

      await ctx.services.teams.removeMember(member, team.id, member.id);
      expect((await ctx.services.tasks.listMyTasks(member)).map((t) => t.id)).toEqual([side.id]);
    });

    it('hides tasks from outsiders', async () => {
      const task = await create('Secret');
      const outsider = await createUser(ctx, 'Outsider');
      await expect(ctx.services.tasks.getTask(outsider, task.id)).rejects.toMatchObject({
        status: 404,
        message: 'Task not found'
      });
    });
  });

  describe('lifecycle', () => {
    it('start moves to in_progress and assigns the actor when nobody is assigned', async () => {
      const task = await create('Start me');
      const { task: started } = await ctx.services.tasks.performAction(member, task.id, 'start');

      expect(started.status).toBe('in_progress');
      expect(started.startedAt).toEqual(ctx.clock.now());
      expect(started.assigneeIds).toEqual([member.id]);
    });

    it('start keeps existing assignees', async () => {
      const task = await create('Owned', { assigneeIds: [owner.id] });
      const { task: started } = await ctx.services.tasks.performAction(member, task.id, 'start');
      expect(started.assigneeIds).toEqual([owner.id]);
    });

    it('refuses actions that do not apply', async () => {
      const task = await create('Twice');
      await ctx.services.tasks.performAction(owner, task.id, 'start');
      await expect(ctx.services.tasks.performAction(owner, task.id, 'start')).rejects.toMatchObject({
        status: 409,
        message: 'Cannot start a task with status in_progress'
      });
      await expect(ctx.services.tasks.performAction(owner, task.id, 'unarchive')).rejects.toMatchObject({
        status: 409,
        message: 'Task is not archived'
      });
    });

    it('complete then reopen clears the timestamps', async () => {
      const task = await create('Loop');
      await ctx.services.tasks.performAction(owner, task.id, 'start');
      const { task: done } = await ctx.services.tasks.performAction(owner, task.id, 'complete');
      expect(done.status).toBe('done');
      expect(done.completedAt).toEqual(ctx.clock.now());

      const { task: reopened } = await ctx.services.tasks.performAction(owner, task.id, 'reopen');
      expect(reopened).toMatchObject({ status: 'todo', startedAt: null, completedAt: null });
    });

    it('updates fields and routes status changes through the workflow', async () => {
      const task = await create('Edit me');
      await ctx.services.tasks.performAction(owner, task.id, 'start');
      const { task: updated } = await ctx.services.tasks.updateTask(member, task.id, {
        title: 'Edited',
        status: 'in_review',
        dueDate: new Date('2026-03-05T00:00:00Z')
      });

      expect(updated).toMatchObject({
        title: 'Edited',
        status: 'in_review',
        startedAt: ctx.clock.now(),
        completedAt: null,
        daysUntilDue: 2
      });
    });

    it('claims an unassigned task when its status is set to in_progress', async () => {
      const task = await create('Claim me');
      const { task: started } = await ctx.services.tasks.updateTask(member, task.id, { status: 'in_progress' });
      expect(started).toMatchObject({ status: 'in_progress', startedAt: ctx.clock.now(), assigneeIds: [member.id] });
    });

    it('refuses status edits no action allows', async () => {
      const task = await create('Strict');
      await expect(ctx.services.tasks.updateTask(member, task.id, { status: 'in_review' })).rejects.toMatchObject({
        status: 409,
        message: 'Cannot move a task with status todo to review'
      });

      await ctx.services.tasks.performAction(member, task.id, 'start');
      await expect(ctx.services.tasks.updateTask(member, task.id, { status: 'todo' })).rejects.toMatchObject({
        status: 409,
        message: 'Cannot reopen a task with status in_progress'
      });

      await ctx.services.tasks.performAction(member, task.id, 'complete');
      await expect(ctx.services.tasks.updateTask(member, task.id, { status: 'in_progress' })).rejects.toMatchObject({
        status: 409,
        message: 'Cannot start a task with status done'
      });
      expect(await ctx.services.tasks.getTask(member, task.id)).toMatchObject({
        status: 'done',
        completedAt: ctx.clock.now()
      });
    });

    it('reports dependents unblocked by a status edit', async () => {
      const build = await create('Build');
      const ship = await create('Ship');
      await ctx.services.tasks.addDependency(owner, ship.id, build.id);

      const result = await ctx.services.tasks.updateTask(member, build.id, { status: 'done' });
      expect(result.task.status).toBe('done');
      expect(result.unblockedTaskIds).toEqual([ship.id]);
    });

    it('lets the creator or an admin delete', async () => {
      const byMember = await ctx.services.tasks.createTask(member, team.id, taskInput('Member task'));
      const byOwner = await create('Owner task');

      await expect(ctx.services.tasks.deleteTask(member, byOwner.id)).rejects.toMatchObject({ status: 403 });
      await ctx.services.tasks.deleteTask(member, byMember.id);
      await ctx.services.tasks.deleteTask(owner, byOwner.id);

      await expect(ctx.services.tasks.getTask(owner, byMember.id)).rejects.toMatchObject({ status: 404 });
      expect(await ctx.services.tasks.listTasks(owner, team.id)).toEqual([]);
    });
  });

  describe('assignments', () => {
    it('assigns once and returns the existing assignment on repeat', async () => {
      const task = await create('Assign');

      const first = await ctx.services.tasks.assignTask(owner, task.id, member.id);
      expect(first.created).toBe(true);
      expect(first.assignment).toMatchObject({ taskId: task.id, assigneeId: member.id, assignedById: owner.id });

      const second = await ctx.services.tasks.assignTask(owner, task.id, member.id);
      expect(second).toEqual({ assignment: first.assignment, created: false });
      expect(await ctx.services.tasks.listAssignments(viewer, task.id)).toHaveLength(1);
    });

    it('only assigns active members', async () => {
      const task = await create('Assign');
      const outsider = await createUser(ctx, 'Outsider');
      await expect(ctx.services.tasks.assignTask(owner, task.id, outsider.id)).rejects.toMatchObject({
        status: 400
      });
    });

    it('unassigns and 404s when there is nothing to remove', async () => {
      const task = await create('Assign', { assigneeIds: [member.id] });
      await ctx.services.tasks.unassignTask(owner, task.id, member.id);
      expect((await ctx.services.tasks.getTask(owner, task.id)).assigneeIds).toEqual([]);

      await expect(ctx.services.tasks.unassignTask(owner, task.id, member.id)).rejects.toMatchObject({
        status: 404,
        message: 'Assignment not found'
      });
    });
  });

  describe('dependencies', () => {
    it('refuses a self-dependency', async () => {
      const task = await create('Solo');
      await expect(ctx.services.tasks.addDependency(owner, task.id, task.id)).rejects.toMatchObject({
        status: 400,
        message: 'Task cannot depend on itself'
      });
    });

    it('requires the prerequisite to exist in the same team', async () => {
      const task = await create('Dependent');
      await expect(ctx.services.tasks.addDependency(owner, task.id, 'missing')).rejects.toMatchObject({
        status: 404,
        message: 'Prerequisite task not found'
      });

      const other = await createTeam(ctx, owner, 'Elsewhere');
      const foreign = await ctx.services.tasks.createTask(owner, other.id, taskInput('Foreign'));
      await expect(ctx.services.tasks.addDependency(owner, task.id, foreign.id)).rejects.toMatchObject({
        status: 400,
        message: 'Tasks must belong to the same team'
      });
    });

    it('returns the existing dependency on repeat', async () => {
      const build = await create('Build');
      const deploy = await create('Deploy');

      const first = await ctx.services.tasks.addDependency(owner, deploy.id, build.id);
      expect(first.created).toBe(true);
      const second = await ctx.services.tasks.addDependency(owner, deploy.id, build.id);
      expect(second).toEqual({ dependency: first.dependency, created: false });
      expect(ctx.repos.tasks.dependencies).toHaveLength(1);
    });

    it('refuses cycles', async () => {
      const a = await create('A');
      const b = await create('B');
      const c = await create('C');
      await ctx.services.tasks.addDependency(owner, a.id, b.id);
      await ctx.services.tasks.addDependency(owner, b.id, c.id);

      await expect(ctx.services.tasks.addDependency(owner, c.id, a.id)).rejects.toMatchObject({
        status: 409,
        message: 'Dependency would create a cycle'
      });
    });

    it('blocks work until prerequisites complete, then reports the unblocked dependents', async () => {
      const build = await create('Build');
      const test = await create('Test');
      const deploy = await create('Deploy');
      await ctx.services.tasks.addDependency(owner, deploy.id, build.id);
      await ctx.services.tasks.addDependency(owner, deploy.id, test.id);

      expect(await ctx.services.tasks.getTask(owner, deploy.id)).toMatchObject({ isBlocked: true });
      expect(await ctx.services.tasks.getTask(owner, build.id)).toMatchObject({ blockingTasksCount: 1 });

      await expect(ctx.services.tasks.performAction(owner, deploy.id, 'start')).rejects.toMatchObject({
        status: 409,
        message: 'Task is blocked by incomplete dependencies'
      });
      await expect(ctx.services.tasks.updateTask(owner, deploy.id, { status: 'done' })).rejects.toMatchObject({
        status: 409
      });

      const afterBuild = await ctx.services.tasks.performAction(owner, build.id, 'complete');
      expect(afterBuild.unblockedTaskIds).toEqual([]);

      const afterTest = await ctx.services.tasks.performAction(owner, test.id, 'cancel');
      expect(afterTest.unblockedTaskIds).toEqual([deploy.id]);

      const started = await ctx.services.tasks.performAction(owner, deploy.id, 'start');
      expect(started.task).toMatchObject({ status: 'in_progress', isBlocked: false });
    });

    it('a blocked task may still be cancelled', async () => {
      const prerequisite = await create('First');
      const task = await create('Second');
      await ctx.services.tasks.addDependency(owner, task.id, prerequisite.id);

      const { task: cancelled } = await ctx.services.tasks.performAction(owner, task.id, 'cancel');
      expect(cancelled.status).toBe('cancelled');
    });

    it('ignores deleted prerequisites when computing blocking', async () => {
      const prerequisite = await create('Dropped');
      const task = await create('Kept');
      await ctx.services.tasks.addDependency(owner, task.id, prerequisite.id);
      await ctx.services.tasks.deleteTask(owner, prerequisite.id);

      expect((await ctx.services.tasks.getTask(owner, task.id)).isBlocked).toBe(false);
    });

    it('lists both directions with their blocking state', async () => {
      const design = await create('Design');
      const build = await create('Build');
      const ship = await create('Ship');
      await ctx.services.tasks.addDependency(owner, build.id, design.id);
      await ctx.services.tasks.addDependency(owner, ship.id, build.id);
      await ctx.services.tasks.performAction(owner, design.id, 'complete');

      const listing = await ctx.services.tasks.listDependencies(viewer, build.id);
      expect(listing.prerequisites.map((l) => [l.task.id, l.isBlocking])).toEqual([[design.id, false]]);
      expect(listing.dependents.map((l) => [l.task.id, l.isBlocking])).toEqual([[ship.id, true]]);
    });

    it('removes a dependency and 404s when absent', async () => {
      const a = await create('A');
      const b = await create('B');
      await ctx.services.tasks.addDependency(owner, a.id, b.id);

      await ctx.services.tasks.removeDependency(owner, a.id, b.id);
      expect((await ctx.services.tasks.getTask(owner, a.id)).isBlocked).toBe(false);
      await expect(ctx.services.tasks.removeDependency(owner, a.id, b.id)).rejects.toMatchObject({
        status: 404,
        message: 'Dependency not found'
      });
    });
  });
});
