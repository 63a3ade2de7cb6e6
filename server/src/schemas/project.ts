import { z } from 'zod';
import { PROJECT_STATUSES } from '../models/enums';
import { PROJECT_ACTIONS } from '../models/project';
import { isoDate, queryBoolean } from './common';

const color = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Color must be a hex code like #1A2B3C');

export const ProjectCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().max(5000).nullable().optional(),
  status: z.enum(PROJECT_STATUSES).default('planning'),
  startDate: isoDate.nullable().optional(),
  endDate: isoDate.nullable().optional(),
  color: color.nullable().optional(),
  position: z.number().int().min(0).default(0),
  estimatedHours: z.number().int().min(0).nullable().optional()
});
export type ProjectCreateInput = z.infer<typeof ProjectCreateSchema>;

export const ProjectUpdateSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(5000).nullable().optional(),
  startDate: isoDate.nullable().optional(),
  endDate: isoDate.nullable().optional(),
  isActive: z.boolean().optional(),
  color: color.nullable().optional(),
  position: z.number().int().min(0).optional(),
  estimatedHours: z.number().int().min(0).nullable().optional()
});
export type ProjectUpdateInput = z.infer<typeof ProjectUpdateSchema>;

export const ProjectListQuery = z.object({
  status: z.enum(PROJECT_STATUSES).optional(),
  includeInactive: queryBoolean.optional()
});

export const ProjectActionParam = z.enum(PROJECT_ACTIONS);
