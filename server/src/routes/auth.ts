import { Router } from 'express';
import { asyncHandler } from '../middleware/async-handler';
import { parse } from '../schemas/common';
import { LoginSchema, RefreshSchema, RegisterSchema } from '../schemas/auth';
import { toUserResponse } from '../schemas/responses';
import type { AuthService } from '../services/auth-service';
import type { UserService } from '../services/user-service';

/**
 * POST /register  create an account (201, user without password hash)
 * POST /login     exchange email + password for a token pair
 * POST /refresh   exchange a refresh token for a new pair
 */
export function createAuthRouter(auth: AuthService, users: UserService): Router {
  const router = Router();

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const user = await users.register(parse(RegisterSchema, req.body));
      res.status(201).json(toUserResponse(user));
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { email, password } = parse(LoginSchema, req.body);
      res.json(await auth.login(email, password));
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (req, res) => {
      const { refreshToken } = parse(RefreshSchema, req.body);
      res.json(await auth.refresh(refreshToken));
    })
  );

  return router;
}
