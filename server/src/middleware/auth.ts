import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../errors';
import type { User } from '../models/types';
import type { AuthService } from '../services/auth-service';
import { asyncHandler } from './async-handler';

export interface AuthRequest extends Request {
  user?: User;
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.substring(7).trim();
  return token || null;
}

export function createAuthMiddleware(auth: AuthService) {
  return asyncHandler(async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) throw new UnauthorizedError('Not authenticated');
    req.user = await auth.getCurrentUser(token);
    next();
  });
}

/** The authenticated user; routes mounted behind the auth middleware always have one. */
export function requireUser(req: AuthRequest): User {
  if (!req.user) throw new UnauthorizedError('Not authenticated');
  return req.user;
}
