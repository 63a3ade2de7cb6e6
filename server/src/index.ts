import { createApp, createServices } from './app';
import { loadConfig, loadEnvFile } from './config';
import { createPoolFromUrl, waitForDatabase } from './db/pool';
import { initializeSchema } from './db/schema';
import { logger } from './logger';
import { createMySqlRepositories } from './repositories/mysql';

loadEnvFile();

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  logger.info(`Starting in ${config.environment} mode`);

  const pool = createPoolFromUrl(config.databaseUrl, { connectionLimit: config.dbPoolSize });
  await waitForDatabase(pool, logger.child('db'));

  // --init-db applies schema.sql; --reset-db drops every table first.
  const resetDb = process.argv.includes('--reset-db');
  if (resetDb || process.argv.includes('--init-db')) {
    await initializeSchema(pool, logger.child('db'), { dropExisting: resetDb });
  }

  const services = createServices(createMySqlRepositories(pool), config, logger);
  const app = createApp({ config, logger, db: pool, services });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`API listening on http://${config.host}:${config.port}`);
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) logger.error('Error while closing HTTP server:', err);
      pool
        .end()
        .then(() => {
          logger.info('Database pool closed');
          process.exit(err ? 1 : 0);
        })
        .catch((poolErr: unknown) => {
          logger.error('Error while closing database pool:', poolErr);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('Failed to start server:', err);
  process.exit(1);
});
