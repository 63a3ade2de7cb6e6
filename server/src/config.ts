import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

export const ENVIRONMENTS = ['development', 'staging', 'production', 'test'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const DEFAULT_SECRET_KEY = 'change-me-in-production';

export interface Config {
  environment: Environment;
  debug: boolean;
  host: string;
  port: number;
  logLevel: LogLevel;
  allowedOrigins: string[];
  /** mysql:// connection string, composed from the MYSQL_* parts when DATABASE_URL is unset */
  databaseUrl: string;
  dbPoolSize: number;
  secretKey: string;
  jwtAlgorithm: JwtAlgorithm;
  accessTokenExpireMinutes: number;
  refreshTokenExpireDays: number;
  bcryptRounds: number;
}

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  ENVIRONMENT: z.enum(ENVIRONMENTS).default('development'),
  DEBUG: booleanString.optional(),
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('info'),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8080'),
  DATABASE_URL: z.string().url().optional(),
  MYSQL_HOST: z.string().default('localhost'),
  MYSQL_PORT: z.coerce.number().int().positive().default(3306),
  MYSQL_USER: z.string().default('root'),
  MYSQL_PASSWORD: z.string().default('root'),
  MYSQL_DATABASE: z.string().default('task_management_db'),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  SECRET_KEY: z.string().min(1).default(DEFAULT_SECRET_KEY),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(7),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10)
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Reads `server/.env` into process.env, from sources or dist; variables already set win. */
export function loadEnvFile(): void {
  dotenv.config({ path: [path.resolve(__dirname, '../.env'), path.resolve(__dirname, '../server/.env')] });
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  if (e.ENVIRONMENT === 'production' && e.SECRET_KEY === DEFAULT_SECRET_KEY) {
    throw new ConfigError('SECRET_KEY must be set in production');
  }

  const databaseUrl =
    e.DATABASE_URL ??
    `mysql://${encodeURIComponent(e.MYSQL_USER)}:${encodeURIComponent(e.MYSQL_PASSWORD)}` +
      `@${e.MYSQL_HOST}:${e.MYSQL_PORT}/${e.MYSQL_DATABASE}`;

  return {
    environment: e.ENVIRONMENT,
    debug: e.DEBUG ?? e.ENVIRONMENT !== 'production',
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    allowedOrigins: splitList(e.ALLOWED_ORIGINS),
    databaseUrl,
    dbPoolSize: e.DB_POOL_SIZE,
    secretKey: e.SECRET_KEY,
    jwtAlgorithm: e.JWT_ALGORITHM,
    accessTokenExpireMinutes: e.ACCESS_TOKEN_EXPIRE_MINUTES,
    refreshTokenExpireDays: e.REFRESH_TOKEN_EXPIRE_DAYS,
    bcryptRounds: e.BCRYPT_ROUNDS
  };
}

export const isProduction = (config: Config): boolean => config.environment === 'production';
