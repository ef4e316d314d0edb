import { Pool } from 'pg';
import { Kysely, PostgresDialect, type PostgresPool } from 'kysely';
import { createQueryMonitor } from './lib/dbMonitor.js';
import type { Database } from './db/types.js';
import { DATABASE_URL, DB_POOL_MAX, DB_SSL_ENABLED, DB_SSL_REJECT_UNAUTHORIZED } from './config.js';

export interface DatabaseHandle {
  pool: Pool;
  db: Kysely<Database>;
}

export function createPool(databaseUrl: string = DATABASE_URL): Pool {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is not configured');
  }
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: DB_SSL_ENABLED ? { rejectUnauthorized: DB_SSL_REJECT_UNAUTHORIZED } : undefined,
    max: DB_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  });
  pool.on('error', (err) => {
    console.error('Unexpected idle pool client error:', err instanceof Error ? err.message : String(err));
  });
  return pool;
}

/** Wraps any pg-compatible pool (pg, or an in-process stand-in) in a Kysely instance. */
export function createDb(pool: PostgresPool, poolName = 'primary'): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
    log: createQueryMonitor(poolName),
  });
}

export function openDatabase(databaseUrl: string = DATABASE_URL): DatabaseHandle {
  const pool = createPool(databaseUrl);
  return { pool, db: createDb(pool) };
}
