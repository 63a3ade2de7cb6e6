import mysql, { type Pool, type PoolOptions } from 'mysql2/promise';
import type { Logger } from '../logger';

export interface PoolSettings {
  connectionLimit?: number;
}

export function parseDatabaseUrl(urlString: string, settings: PoolSettings = {}): PoolOptions {
  const url = new URL(urlString);
  if (url.protocol !== 'mysql:') {
    throw new Error(`Unsupported DB protocol: ${url.protocol}. Expected mysql://`);
  }
  const sslMode = url.searchParams.get('sslmode') || url.searchParams.get('ssl') || '';
  const ssl =
    sslMode === 'require' || sslMode === 'true'
      ? { rejectUnauthorized: false }
      : undefined;
  return {
    host: url.hostname,
    port: Number(url.port || 3306),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.replace(/^\//, ''),
    waitForConnections: true,
    connectionLimit: settings.connectionLimit ?? 10,
    // DATETIME columns hold UTC; mysql2 converts to and from Date with this zone.
    timezone: 'Z',
    ssl
  };
}

export function createPoolFromUrl(urlString: string, settings: PoolSettings = {}): Pool {
  return mysql.createPool(parseDatabaseUrl(urlString, settings));
}

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy';
  database: 'connected' | 'error';
  message: string;
}

/** Minimal surface the health check needs, so callers can pass a pool or a stand-in. */
export interface Queryable {
  query(sql: string): Promise<[unknown, unknown]>;
}

function firstHealthValue(rows: unknown): number {
  if (!Array.isArray(rows)) return NaN;
  const first: unknown = rows[0];
  if (typeof first !== 'object' || first === null || !('health_check' in first)) return NaN;
  return Number(first.health_check);
}

export async function checkDatabaseHealth(db: Queryable): Promise<DatabaseHealth> {
  try {
    const [rows] = await db.query('SELECT 1 AS health_check');
    if (firstHealthValue(rows) !== 1) {
      return {
        status: 'unhealthy',
        database: 'error',
        message: 'Database query returned unexpected result'
      };
    }
    return { status: 'healthy', database: 'connected', message: 'Database is accessible' };
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return {
      status: 'unhealthy',
      database: 'error',
      message: `Database connection failed: ${reason}`
    };
  }
}

export interface WaitOptions {
  maxRetries?: number;
  retryIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitForDatabase(db: Queryable, logger: Logger, options: WaitOptions = {}): Promise<void> {
  const maxRetries = options.maxRetries ?? 5;
  const retryIntervalMs = options.retryIntervalMs ?? 5000;
  const sleep = options.sleep ?? delay;

  logger.info('Waiting for database to become available...');
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const health = await checkDatabaseHealth(db);
    if (health.status === 'healthy') {
      logger.info(`Database is ready after ${attempt} attempt(s)`);
      return;
    }
    logger.debug(`Database connection attempt ${attempt} failed: ${health.message}`);

    if (attempt < maxRetries) {
      logger.info(
        `Database not ready, retrying in ${retryIntervalMs / 1000}s... (attempt ${attempt}/${maxRetries})`
      );
      await sleep(retryIntervalMs);
    } else {
      logger.error(`Database failed to become available after ${maxRetries} attempts`);
    }
  }
  throw new Error(`Database is not available after ${maxRetries} attempts`);
}
