import { Pool, type QueryResultRow } from 'pg';
import { config } from '../config/index.js';
import logger from '../utils/logger.js';

export type Row = Record<string, unknown>;

/**
 * Minimal query surface the stores depend on. The pool below satisfies it;
 * tests pass an in-process fake.
 */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<Row[]>;
}

export const pool = new Pool({
  host: config.postgres.host,
  port: config.postgres.port,
  user: config.postgres.user,
  password: config.postgres.password,
  database: config.postgres.database,
  max: config.postgres.poolMax,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 3000,
  ssl: config.postgres.sslEnabled ? { rejectUnauthorized: true } : false,
});

pool.on('error', (err) => {
  logger.error('Unexpected PostgreSQL error', { error: err.message });
});

pool.on('connect', () => {
  logger.debug('New PostgreSQL connection established');
});

export async function query<T extends QueryResultRow = Row>(text: string, params?: unknown[]): Promise<T[]> {
  const start = Date.now();
  const result = await pool.query<T>(text, params);
  const duration = Date.now() - start;
  logger.debug('Query executed', { text: text.slice(0, 80), duration, rows: result.rowCount });
  return result.rows;
}

export const db: Queryable = {
  query: (text, params) => query<Row>(text, params),
};

export async function healthCheck(): Promise<boolean> {
  try {
    await query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}

export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('PostgreSQL pool closed');
}
