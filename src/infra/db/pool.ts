import pg from 'pg';
import type { Pool } from 'pg';

/**
 * Create the connection pool. Connections are acquired per query and
 * released when it completes; see withTransaction for multi-statement work.
 */
export function createPool(connectionString: string | undefined): Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('Unexpected database error:', err);
  });

  return pool;
}
