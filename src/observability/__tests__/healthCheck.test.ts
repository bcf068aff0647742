import { describe, it, expect } from 'vitest';
import { openSqlite } from '../../db/index.js';
import { MigrationRunner } from '../../migrations/runner.js';
import { createHealthChecker } from '../healthCheck.js';

describe('createHealthChecker', () => {
  it('is healthy once the schema exists', async () => {
    const db = openSqlite(':memory:');
    await new MigrationRunner(db).runAll();
    const health = createHealthChecker(db, 1_000);

    const status = await health.getHealthStatus();
    expect(status.status).toBe('healthy');
    expect(status.checks.database.status).toBe('up');
    expect(status.checks.schema.status).toBe('up');
    expect(await health.isReady()).toBe(true);
    await db.close();
  });

  it('is degraded before migrations have run', async () => {
    const db = openSqlite(':memory:');
    const health = createHealthChecker(db, 1_000);

    const status = await health.getHealthStatus();
    expect(status.status).toBe('degraded');
    expect(status.checks.schema).toMatchObject({ status: 'down' });
    expect(await health.isReady()).toBe(false);
    expect(await health.isAlive()).toBe(true);
    await db.close();
  });

  it('is unhealthy when the connection is gone', async () => {
    const db = openSqlite(':memory:');
    await db.close();
    const health = createHealthChecker(db, 1_000);

    expect((await health.getHealthStatus()).status).toBe('unhealthy');
    expect(await health.isAlive()).toBe(false);
  });
});
