import { Router } from 'express';
import type { Config } from '../config';
import { checkDatabaseHealth, type Queryable } from '../db/pool';
import { asyncHandler } from '../middleware/async-handler';

export interface ServiceInfo {
  name: string;
  version: string;
}

export function createHealthRouter(db: Queryable, config: Config, info: ServiceInfo): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      name: info.name,
      version: info.version,
      environment: config.environment,
      api: '/api/v1'
    });
  });

  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const database = await checkDatabaseHealth(db);
      res.status(database.status === 'healthy' ? 200 : 503).json({
        status: database.status,
        version: info.version,
        environment: config.environment,
        database
      });
    })
  );

  return router;
}
