import type { NextFunction, Response } from 'express';
import type { AuthRequest } from './auth';

type AsyncRoute = (req: AuthRequest, res: Response, next: NextFunction) => Promise<void>;

/** Express 4 does not catch rejected handlers; forward them to the error middleware. */
export function asyncHandler(fn: AsyncRoute) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}
