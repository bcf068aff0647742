// src/db/index.ts
// Database adapter factory: picks the DbAdapter from DATABASE_URL
// (postgresql://... → PostgresAdapter, otherwise SqliteAdapter).

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createLogger } from '../observability/logger.js';
import { MigrationRunner } from '../migrations/runner.js';
import { SqliteAdapter } from './sqlite.js';
import { PostgresAdapter } from './postgres.js';
import type { DbAdapter } from './types.js';

export type { DbAdapter, RunResult } from './types.js';
export { SqliteAdapter } from './sqlite.js';
export { PostgresAdapter } from './postgres.js';

const log = createLogger('db');

let _adapter: SqliteAdapter | PostgresAdapter | null = null;

/**
 * Open an in-process SQLite adapter. `:memory:` gives a private database,
 * which is what the tests use.
 */
export function openSqlite(filename: string): SqliteAdapter {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const rawDb = new Database(filename);
  rawDb.pragma('journal_mode = WAL');
  return new SqliteAdapter(rawDb);
}

/**
 * Create (or return the cached) database adapter.
 */
export function createAdapter(): SqliteAdapter | PostgresAdapter {
  if (_adapter) return _adapter;

  if (config.database.driver === 'postgresql') {
    _adapter = new PostgresAdapter(config.database.url, config.database.poolMax);
  } else {
    _adapter = openSqlite(config.database.sqlitePath);
  }

  log.info({ driver: _adapter.dbType }, 'Database adapter created');
  return _adapter;
}

/**
 * Apply pending migrations. Called once before the server listens.
 * Throws when a migration fails so startup stops instead of serving a
 * half-built schema.
 */
export async function initDb(adapter: DbAdapter, migrationsDir?: string): Promise<void> {
  const runner = new MigrationRunner(adapter, migrationsDir);
  const { applied, failed } = await runner.runAll();

  if (failed.length > 0) {
    throw new Error(`Migration failed: ${failed.join(', ')}`);
  }
  if (applied.length > 0) {
    log.info({ applied }, 'Migrations applied');
  }
}
