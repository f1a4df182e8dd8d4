import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';

export interface ConnectionOptions {
  /** Falls back to the DATABASE_URL environment variable */
  databaseUrl?: string;
  /** Upper bound on pooled connections shared by ingestion workers and queries */
  poolMax?: number;
  /** Server-side statement timeout in milliseconds (0 disables it) */
  statementTimeoutMs?: number;
}

// Pool backing each drizzle instance, so closeDb can release it
const poolMap = new WeakMap<NodePgDatabase<typeof schema>, pg.Pool>();

/**
 * SSL is used for anything that is not a local database, or when the URL
 * asks for it explicitly.
 */
export function needsSsl(url: string): boolean {
  const isLocalhost = url.includes('localhost') || url.includes('127.0.0.1');
  const hasSslParam = url.includes('sslmode=');
  const isProduction = process.env.NODE_ENV === 'production';
  return isProduction || hasSslParam || !isLocalhost;
}

/**
 * Create a database connection backed by a node-postgres pool.
 */
export function createDb(options: ConnectionOptions = {}) {
  const url = options.databaseUrl ?? process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new pg.Pool({
    connectionString: url,
    max: options.poolMax ?? 10,
    statement_timeout: options.statementTimeoutMs || undefined,
    ssl: needsSsl(url) ? { rejectUnauthorized: false } : false,
  });
  pool.on('error', (error) => {
    console.error('[db] Idle client error:', error.message);
  });

  const db = drizzle(pool, { schema });
  poolMap.set(db, pool);
  return db;
}

/**
 * Close a database connection and release the pool.
 */
export async function closeDb(db: Database): Promise<void> {
  const pool = poolMap.get(db);
  if (pool) {
    await pool.end();
    poolMap.delete(db);
  }
}

export type Database = ReturnType<typeof createDb>;
