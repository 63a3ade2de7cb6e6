import type { Request, Response, NextFunction } from 'express';
import type { ZodError } from 'zod';
import type { Logger } from './logger';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
  }
}

export class ValidationError extends BadRequestError {
  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      'Validation failed',
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized') {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Insufficient permissions') {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export function isDuplicateEntryError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ER_DUP_ENTRY';
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Route not found' });
}

export function createErrorHandler(logger: Logger, options: { exposeErrors: boolean }) {
  // Express recognises error middleware by its four parameters.
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof HttpError) {
      if (err.status >= 500) {
        logger.error(`${req.method} ${req.originalUrl} failed:`, err);
      }
      const body: { error: string; details?: unknown } = { error: err.message };
      if (err.details !== undefined) body.details = err.details;
      res.status(err.status).json(body);
      return;
    }

    if (isJsonSyntaxError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    if (isDuplicateEntryError(err)) {
      res.status(409).json({ error: 'Resource already exists' });
      return;
    }

    logger.error(`${req.method} ${req.originalUrl} failed:`, err);
    const message =
      options.exposeErrors && err instanceof Error ? err.message : 'Internal server error';
    res.status(500).json({ error: message });
  };
}
