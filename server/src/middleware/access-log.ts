import type { Request, Response, NextFunction } from 'express';
import type { Logger } from '../logger';

export function accessLog(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const started = Date.now();
    res.on('finish', () => {
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`;
      if (res.statusCode >= 500) logger.warn(line);
      else logger.info(line);
    });
    next();
  };
}
