import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openSqlite, type SqliteAdapter } from '../index.js';

let db: SqliteAdapter;

async function count(): Promise<number> {
  const row = await db.queryOne<{ n: number }>('SELECT COUNT(*) AS n FROM items');
  return row?.n ?? -1;
}

beforeEach(async () => {
  db = openSqlite(':memory:');
  await db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT NOT NULL)');
});

afterEach(async () => {
  await db.close();
});

describe('SqliteAdapter basics', () => {
  it('runs statements and reports changes', async () => {
    const first = await db.run('INSERT INTO items (name) VALUES (?)', ['a']);
    await db.run('INSERT INTO items (name) VALUES (?)', ['b']);

    expect(first.changes).toBe(1);
    expect(Number(first.lastInsertRowid)).toBe(1);
    expect(await db.queryAll<{ name: string }>('SELECT name FROM items ORDER BY id')).toEqual([
      { name: 'a' },
      { name: 'b' },
    ]);
  });

  it('returns undefined when no row matches', async () => {
    expect(await db.queryOne('SELECT * FROM items WHERE id = ?', [99])).toBeUndefined();
  });
});

describe('SqliteAdapter.transaction', () => {
  it('commits on success', async () => {
    await db.transaction(async (tx) => {
      await tx.run('INSERT INTO items (name) VALUES (?)', ['a']);
    });
    expect(await count()).toBe(1);
  });

  it('rolls back on failure', async () => {
    await expect(
      db.transaction(async (tx) => {
        await tx.run('INSERT INTO items (name) VALUES (?)', ['a']);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await count()).toBe(0);
    expect(db.raw.inTransaction).toBe(false);
  });
});

describe('SqliteAdapter.snapshot', () => {
  it('reads inside a transaction and closes it', async () => {
    await db.run('INSERT INTO items (name) VALUES (?)', ['a']);

    const seen = await db.snapshot(async (tx) => {
      expect(db.raw.inTransaction).toBe(true);
      return (await tx.queryAll('SELECT * FROM items')).length;
    });

    expect(seen).toBe(1);
    expect(db.raw.inTransaction).toBe(false);
  });

  it('rolls back and rethrows when the reader fails', async () => {
    await expect(
      db.snapshot(async (tx) => {
        await tx.queryAll('SELECT * FROM missing_table');
      })
    ).rejects.toThrow(/no such table/);

    expect(db.raw.inTransaction).toBe(false);
  });

  it('runs overlapping snapshots one after another', async () => {
    const order: string[] = [];
    const slow = db.snapshot(async () => {
      order.push('a:start');
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push('a:end');
    });
    const fast = db.snapshot(async () => {
      order.push('b:start');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['a:start', 'a:end', 'b:start']);
  });

  it('keeps serving snapshots after one fails', async () => {
    const failed = db.snapshot(async () => {
      throw new Error('first');
    });
    const next = db.snapshot(async (tx) => (await tx.queryAll('SELECT 1 AS one')).length);

    await expect(failed).rejects.toThrow('first');
    expect(await next).toBe(1);
  });

  it('runs a snapshot opened through tx inside that transaction', async () => {
    await db.transaction(async (tx) => {
      await tx.run('INSERT INTO items (name) VALUES (?)', ['own write']);
      const seen = await tx.snapshot(async (inner) => (await inner.queryAll('SELECT * FROM items')).length);
      expect(seen).toBe(1);
    });

    expect(await count()).toBe(1);
  });

  it('makes a transaction wait for an open snapshot', async () => {
    const order: string[] = [];
    const reading = db.snapshot(async (tx) => {
      order.push('snapshot:start');
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(`snapshot:end:${(await tx.queryAll('SELECT * FROM items')).length}`);
    });
    const writing = db.transaction(async (tx) => {
      order.push('transaction:start');
      await tx.run('INSERT INTO items (name) VALUES (?)', ['a']);
    });

    await Promise.all([reading, writing]);
    expect(order).toEqual(['snapshot:start', 'snapshot:end:0', 'transaction:start']);
    expect(await count()).toBe(1);
  });

  it('queues a snapshot until an open transaction commits', async () => {
    const writing = db.transaction(async (tx) => {
      await tx.run('INSERT INTO items (name) VALUES (?)', ['pending']);
      await new Promise((resolve) => setTimeout(resolve, 5));
    });
    const seen = db.snapshot(async (tx) => (await tx.queryAll('SELECT * FROM items')).length);

    await writing;
    expect(await seen).toBe(1);
    expect(db.raw.inTransaction).toBe(false);
  });
});
