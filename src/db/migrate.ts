import fs from 'fs';
import path from 'path';
import { pool } from './postgres.js';
import { errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

function migrationsDirectory(): string {
  const sourceDir = path.join(process.cwd(), 'src', 'db', 'migrations');
  if (fs.existsSync(sourceDir)) return sourceDir;
  // Deployments that ship only dist/ carry the SQL under dist/db/migrations
  return path.join(process.cwd(), 'dist', 'db', 'migrations');
}

async function executedMigrations(): Promise<Set<string>> {
  const client = await pool.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);
    const { rows } = await client.query<{ name: string }>('SELECT name FROM migrations');
    return new Set(rows.map(row => row.name));
  } finally {
    client.release();
  }
}

async function migrate(): Promise<void> {
  const executedNames = await executedMigrations();

  const dir = migrationsDirectory();
  const files = fs.readdirSync(dir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    if (executedNames.has(file)) continue;

    logger.info(`Executing migration: ${file}`);
    const content = fs.readFileSync(path.join(dir, file), 'utf-8');

    const migrationClient = await pool.connect();
    try {
      await migrationClient.query('BEGIN');
      await migrationClient.query(content);
      await migrationClient.query('INSERT INTO migrations (name) VALUES ($1)', [file]);
      await migrationClient.query('COMMIT');
      logger.info(`Migration ${file} completed`);
    } catch (error) {
      await migrationClient.query('ROLLBACK');
      // Later migrations may depend on this one
      throw new Error(`Migration ${file} failed: ${errorMessage(error)}`);
    } finally {
      migrationClient.release();
    }
  }

  logger.info('Migration process finished', { applied: files.filter(f => !executedNames.has(f)).length });
}

void migrate()
  .catch((error: unknown) => {
    logger.error('Migration failed', { error: errorMessage(error) });
    process.exitCode = 1;
  })
  .finally(() => pool.end());
