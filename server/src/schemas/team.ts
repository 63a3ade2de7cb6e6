import { z } from 'zod';
import { TASK_PRIORITIES, TEAM_ROLES } from '../models/enums';
import { SLUG_PATTERN } from '../utils/slug';
import { id, queryBoolean } from './common';

const slug = z.string().trim().toLowerCase().max(100).regex(SLUG_PATTERN, 'Slug may only contain lowercase letters, digits and single hyphens');

export const TeamCreateSchema = z.object({
  name: z.string().trim().min(1).max(100),
  slug: slug.optional(),
  description: z.string().max(2000).nullable().optional(),
  allowPublicSignup: z.boolean().default(false),
  defaultTaskPriority: z.enum(TASK_PRIORITIES).default('medium')
});
export type TeamCreateInput = z.infer<typeof TeamCreateSchema>;

export const TeamUpdateSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  slug: slug.optional(),
  description: z.string().max(2000).nullable().optional(),
  isActive: z.boolean().optional(),
  allowPublicSignup: z.boolean().optional(),
  defaultTaskPriority: z.enum(TASK_PRIORITIES).optional()
});
export type TeamUpdateInput = z.infer<typeof TeamUpdateSchema>;

export const InviteSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().optional(),
    userId: id.optional(),
    role: z.enum(TEAM_ROLES).default('member')
  })
  .refine((v) => v.email !== undefined || v.userId !== undefined, {
    message: 'Either email or userId is required',
    path: ['email']
  });
export type InviteInput = z.infer<typeof InviteSchema>;

export const RoleChangeSchema = z.object({
  role: z.enum(TEAM_ROLES)
});

export const MemberListQuery = z.object({
  includePending: queryBoolean.default('false')
});
