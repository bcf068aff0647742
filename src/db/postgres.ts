// src/db/postgres.ts
// PostgreSQL adapter: implements DbAdapter on a `pg` connection pool.
// SQL strings use SQLite-style '?' placeholders; this adapter converts them
// to PostgreSQL's positional '$1, $2, ...' syntax.

import { Pool, type PoolClient } from 'pg';
import { createLogger } from '../observability/logger.js';
import type { DbAdapter, RunResult } from './types.js';

const log = createLogger('db/postgres');

/* ---------- Placeholder Conversion ---------- */

/**
 * Convert '?' placeholders to '$1, $2, ...'.
 * Example: "WHERE id = ? AND workspace = ?" → "WHERE id = $1 AND workspace = $2"
 */
export function toPositional(sql: string): string {
  let i = 0;
  return sql.replace(/\?/g, () => `$${++i}`);
}

async function rollbackQuietly(client: PoolClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (err) {
    log.warn({ err }, 'ROLLBACK failed');
  }
}

/* ---------- PostgresAdapter ---------- */

export class PostgresAdapter implements DbAdapter {
  readonly dbType = 'postgresql' as const;
  private pool: Pool;

  constructor(connectionString: string, maxConnections = 10) {
    this.pool = new Pool({ connectionString, max: maxConnections });
    this.pool.on('error', (err) => {
      log.error({ err }, 'Idle PostgreSQL client error');
    });
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const result = await this.pool.query(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.pool.query(toPositional(sql), params);
    return result.rows as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = await this.pool.query<{ id?: number | bigint }>(toPositional(sql), params);
    // Callers that need the new id include `RETURNING id`.
    return {
      changes: result.rowCount ?? 0,
      lastInsertRowid: result.rows[0]?.id ?? 0,
    };
  }

  async exec(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return this.withClient('BEGIN', fn);
  }

  snapshot<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // READ COMMITTED would give each statement its own snapshot;
    // REPEATABLE READ fixes one for the whole transaction.
    return this.withClient('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY', fn);
  }

  private async withClient<T>(begin: string, fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query(begin);
      const result = await fn(new PostgresTxAdapter(client));
      await client.query('COMMIT');
      return result;
    } catch (e) {
      await rollbackQuietly(client);
      throw e;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/* ---------- PostgresTxAdapter (transaction-scoped) ---------- */

/**
 * Uses a pinned PoolClient so every operation in the transaction shares the
 * same server-side connection and snapshot.
 */
class PostgresTxAdapter implements DbAdapter {
  readonly dbType = 'postgresql' as const;

  constructor(private readonly client: PoolClient) {}

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const result = await this.client.query(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.client.query(toPositional(sql), params);
    return result.rows as T[];
  }

  async run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = await this.client.query<{ id?: number | bigint }>(toPositional(sql), params);
    return {
      changes: result.rowCount ?? 0,
      lastInsertRowid: result.rows[0]?.id ?? 0,
    };
  }

  async exec(sql: string): Promise<void> {
    await this.client.query(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // Already inside a transaction; run directly.
    return fn(this);
  }

  snapshot<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    // The outer PostgresAdapter releases the client.
    return Promise.resolve();
  }
}
