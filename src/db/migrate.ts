// src/db/migrate.ts
// What: Applies src/db/migrations/*.sql in filename order, once each.
// How: Applied file names are kept in schema_migrations; only files missing from it run. Each file owns its
//      BEGIN/COMMIT, and its ledger row is written right after it succeeds.

import { promises as fs } from 'fs';
import path from 'path';
import baseLogger, { type Logger } from '../logging.js';
import type { Db } from './pool.js';

export async function listMigrationFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));
}

export function pendingMigrations(files: string[], applied: Iterable<string>): string[] {
  const done = new Set(applied);
  return files.filter((f) => !done.has(f));
}

export async function runMigrations(db: Db, dir: string, log: Logger = baseLogger): Promise<string[]> {
  const files = await listMigrationFiles(dir);
  if (files.length === 0) {
    log.info({ dir }, 'No migrations found');
    return [];
  }

  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name        TEXT PRIMARY KEY,
       applied_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );
  const res = await db.query<{ name: string }>('SELECT name FROM schema_migrations');
  const pending = pendingMigrations(
    files,
    res.rows.map((r) => r.name),
  );

  for (const file of pending) {
    const sql = await fs.readFile(path.join(dir, file), 'utf8');
    log.info({ file }, 'Applying migration');
    await db.query(sql);
    await db.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
  }
  log.info({ applied: pending.length, total: files.length }, 'Migrations complete');
  return pending;
}
