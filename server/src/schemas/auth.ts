import { z } from 'zod';

const email = z.string().trim().toLowerCase().email().max(255);

export const RegisterSchema = z.object({
  email,
  password: z.string().min(8).max(100),
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  timezone: z.string().trim().min(1).max(50).default('UTC')
});
export type RegisterInput = z.infer<typeof RegisterSchema>;

export const LoginSchema = z.object({
  email,
  password: z.string().min(1)
});
export type LoginInput = z.infer<typeof LoginSchema>;

export const RefreshSchema = z.object({
  refreshToken: z.string().min(1)
});
