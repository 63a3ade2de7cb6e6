import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATUSES } from '../models/enums';
import { TASK_ACTIONS } from '../models/task';
import { id, isoDate, pagination, queryBoolean } from './common';

const hours = z.number().int().min(0);

export const TaskCreateSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().max(1000).nullable().optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  dueDate: isoDate.nullable().optional(),
  projectId: id.nullable().optional(),
  position: z.number().int().min(0).default(0),
  estimatedHours: hours.nullable().optional(),
  assigneeIds: z.array(id).max(50).default([])
});
export type TaskCreateInput = z.infer<typeof TaskCreateSchema>;

export const TaskUpdateSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  description: z.string().max(1000).nullable().optional(),
  status: z.enum(TASK_STATUSES).optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  dueDate: isoDate.nullable().optional(),
  projectId: id.nullable().optional(),
  position: z.number().int().min(0).optional(),
  estimatedHours: hours.nullable().optional(),
  actualHours: hours.nullable().optional()
});
export type TaskUpdateInput = z.infer<typeof TaskUpdateSchema>;

export const TaskListQuery = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  projectId: id.optional(),
  assigneeId: id.optional(),
  includeArchived: queryBoolean.optional(),
  ...pagination
});
export type TaskListInput = z.infer<typeof TaskListQuery>;

export const TaskActionParam = z.enum(TASK_ACTIONS);

export const AssignSchema = z.object({
  userId: id
});

export const DependencySchema = z.object({
  prerequisiteTaskId: id
});
