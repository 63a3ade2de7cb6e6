import fs from 'fs';
import path from 'path';
import type { Logger } from '../logger';
import type { Queryable } from './pool';

// Child tables first, so foreign keys never block a drop.
export const TABLES = [
  'task_dependencies',
  'task_assignments',
  'tasks',
  'projects',
  'team_memberships',
  'teams',
  'users'
] as const;

function locateSchemaFile(): string {
  const candidates = [
    path.join(__dirname, 'schema.sql'),
    // compiled output lives in dist/db; the SQL stays beside the sources
    path.resolve(__dirname, '../../server/src/db/schema.sql')
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/** Splits a SQL script into statements, dropping `--` comment lines. */
export function splitStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function initializeSchema(
  pool: Queryable,
  logger: Logger,
  options: { dropExisting?: boolean } = {}
): Promise<void> {
  if (options.dropExisting) {
    logger.warn('Dropping existing database tables');
    for (const table of TABLES) {
      await pool.query(`DROP TABLE IF EXISTS ${table}`);
    }
  }

  logger.info('Creating database tables');
  const statements = splitStatements(fs.readFileSync(locateSchemaFile(), 'utf-8'));
  for (const statement of statements) {
    await pool.query(statement);
  }
  logger.info(`Schema ready (${statements.length} statements applied)`);
}
