// scripts/run-migrations.ts
// What: CLI wrapper around runMigrations() for `npm run migrate`.
// How: Reads DATABASE_URL from .env/process env, logs the target without the password, applies pending files from
//      src/db/migrations and ends the pool.

import 'dotenv/config';
import path from 'path';
import { runMigrations } from '../src/db/migrate.js';
import { createPool } from '../src/db/pool.js';
import logger from '../src/logging.js';

async function main(): Promise<void> {
  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    throw new Error('DATABASE_URL is not set');
  }

  try {
    const u = new URL(connStr);
    logger.info(
      { user: u.username, host: u.hostname, port: u.port || '5432', database: u.pathname.replace(/^\//, '') },
      'Migration target',
    );
  } catch (err) {
    logger.warn({ err }, 'Could not parse DATABASE_URL');
  }

  const pool = createPool(connStr);
  try {
    await runMigrations(pool, path.resolve(process.cwd(), 'src/db/migrations'));
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
});
