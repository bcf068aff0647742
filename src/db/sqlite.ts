// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// All methods return Promises that resolve synchronously (better-sqlite3 is sync).

import Database from 'better-sqlite3';
import { createLogger } from '../observability/logger.js';
import type { DbAdapter, RunResult } from './types.js';

const log = createLogger('db/sqlite');

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private _db: Database.Database;
  private queue: Promise<void> = Promise.resolve();

  constructor(db: Database.Database) {
    this._db = db;
  }

  /**
   * The underlying better-sqlite3 Database.
   * Used by the adapter factory (pragmas) and tests; stores use the adapter methods.
   */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row: T | undefined = this._db.prepare<unknown[], T>(sql).get(...params);
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows: T[] = this._db.prepare<unknown[], T>(sql).all(...params);
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() doesn't take async callbacks, so
    // BEGIN/COMMIT/ROLLBACK are issued by hand.
    return this.enqueue('BEGIN', fn);
  }

  snapshot<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // A deferred transaction pins the read snapshot at its first SELECT
    // (WAL) or holds a SHARED lock that keeps writers out (rollback journal).
    return this.enqueue('BEGIN DEFERRED', fn);
  }

  /**
   * Transactions and snapshots share one connection, so they take turns
   * instead of nesting BEGINs. Work started through `tx` runs inside the
   * current turn.
   *
   * ATOMICITY LIMITATION: the `await` points inside fn() let other requests
   * run plain statements (run/queryAll) on this same connection, and those
   * land inside the open transaction. Multi-writer deployments belong on
   * PostgreSQL.
   */
  private enqueue<T>(begin: string, fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    const turn = this.queue.then(() => this.runInTransaction(begin, fn));
    // The queue only orders turns; the caller still receives turn's rejection.
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async runInTransaction<T>(
    begin: string,
    fn: (tx: DbAdapter) => Promise<T>
  ): Promise<T> {
    this._db.exec(begin);
    try {
      const result = await fn(new SqliteTxScope(this));
      this._db.exec('COMMIT');
      return result;
    } catch (e) {
      this.rollback();
      throw e;
    }
  }

  private rollback(): void {
    if (!this._db.inTransaction) return;
    try {
      this._db.exec('ROLLBACK');
    } catch (err) {
      log.warn({ err }, 'ROLLBACK failed');
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}

/* ---------- SqliteTxScope (inside one transaction turn) ---------- */

/**
 * Handed to transaction/snapshot callbacks. Nested transaction() and
 * snapshot() calls run directly in the enclosing turn rather than queueing
 * behind it.
 */
class SqliteTxScope implements DbAdapter {
  readonly dbType = 'sqlite' as const;

  constructor(private readonly adapter: SqliteAdapter) {}

  queryOne<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | undefined> {
    return this.adapter.queryOne<T>(sql, params);
  }

  queryAll<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]> {
    return this.adapter.queryAll<T>(sql, params);
  }

  run(sql: string, params?: unknown[]): Promise<RunResult> {
    return this.adapter.run(sql, params);
  }

  exec(sql: string): Promise<void> {
    return this.adapter.exec(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  snapshot<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    // The outer SqliteAdapter owns the connection.
    return Promise.resolve();
  }
}
