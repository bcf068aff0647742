// src/db/types.ts
// Database adapter interface: one async API over SQLite and PostgreSQL

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Both SQLite (better-sqlite3) and PostgreSQL (pg) implement this.
 *
 * Query methods use SQLite '?' placeholders in SQL strings.
 * The PostgresAdapter converts '?' to '$1, $2, ...' before execution.
 */
export interface DbAdapter {
  /** Identifies the underlying driver. Used for dialect-specific SQL branches. */
  readonly dbType: 'sqlite' | 'postgresql';

  /**
   * Execute a SELECT query and return the first matching row, or undefined.
   * @param sql    SQL string with '?' parameter placeholders
   * @param params Ordered parameter values matching the placeholders
   */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  /**
   * Execute a SELECT query and return all matching rows.
   */
  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /**
   * Execute an INSERT, UPDATE, or DELETE statement.
   * For PostgreSQL, include `RETURNING id` in the SQL to populate lastInsertRowid.
   */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /**
   * Execute raw SQL without parameters (DDL, multi-statement scripts).
   */
  exec(sql: string): Promise<void>;

  /**
   * Execute a series of operations atomically.
   * On error, ROLLBACK is issued automatically.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  /**
   * Run read-only work against one point-in-time view. Queries issued
   * through `tx` do not see commits made by other connections after the
   * view was taken.
   *
   * PostgreSQL: REPEATABLE READ on a pinned client.
   * SQLite: a deferred transaction, queued with transaction() on the shared
   * connection. Plain statements issued on that same connection while the
   * snapshot is open run inside it, so in-process writers are not isolated.
   */
  snapshot<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  /** Close the database connection (pool). */
  close(): Promise<void>;
}
