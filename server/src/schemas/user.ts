import { z } from 'zod';

export const UserUpdateSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(255).optional(),
  firstName: z.string().trim().min(1).max(100).optional(),
  lastName: z.string().trim().min(1).max(100).optional(),
  timezone: z.string().trim().min(1).max(50).optional()
});
export type UserUpdateInput = z.infer<typeof UserUpdateSchema>;

export const ChangePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(8).max(100)
});
