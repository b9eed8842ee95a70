// src/db/pool.ts
// What: Shared Postgres connection pool factory.
// How: Builds a pg Pool from DATABASE_URL with a small pool size and bounded connection/statement timeouts,
//      so a stalled store call fails that operation instead of hanging the run.

import { Pool } from 'pg';
import logger from '../logging.js';

export type Db = Pick<Pool, 'query' | 'connect'>;

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: 60_000,
  });
  // Idle clients can error when the server drops them; pg requires a listener or the process crashes.
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle Postgres client error');
  });
  return pool;
}
