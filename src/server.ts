// src/server.ts
// Process entry point: open storage, apply migrations, register this
// instance, start the gauge and heartbeat timers, then listen.

import { config } from "./config.js";
import { createAdapter, initDb } from "./db/index.js";
import { MetricsAggregator } from "./metrics/aggregator.js";
import { resolveScope } from "./metrics/scope.js";
import { createSqlMetricsSource } from "./store/metricsSource.js";
import { InstanceRegistry } from "./instances/registry.js";
import {
  createHealthChecker,
  createLogger,
  startGaugeUpdates,
  stopGaugeUpdates,
} from "./observability/index.js";
import { createApp } from "./app.js";

const log = createLogger("server");

// --- Main ---
async function main() {
  const db = createAdapter();
  await initDb(db);

  const aggregator = new MetricsAggregator(createSqlMetricsSource(db));
  const instances = new InstanceRegistry(db, {
    instanceId: config.instances.id,
    hostname: config.instances.hostname,
    staleAfterMs: config.instances.staleAfterMs,
  });
  instances.setMetricsCollector(() => {
    const memory = process.memoryUsage();
    return {
      heap_used_bytes: memory.heapUsed,
      rss_bytes: memory.rss,
      uptime_seconds: Math.floor(process.uptime()),
    };
  });

  const app = createApp({
    aggregator,
    instances,
    health: createHealthChecker(db, config.health.timeoutMs),
  });

  log.info(
    {
      driver: db.dbType,
      node: process.version,
      instanceId: instances.instanceId,
      metricsWorkspace: config.metrics.workspace,
    },
    "Boot info"
  );

  await instances.register();
  await instances.heartbeat();
  instances.startHeartbeat(config.instances.heartbeatIntervalMs);

  startGaugeUpdates(aggregator, {
    intervalMs: config.metrics.refreshIntervalMs,
    scope: resolveScope(config.metrics.workspace),
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down");

    stopGaugeUpdates();
    instances.stopHeartbeat();
    try {
      await instances.deregister();
    } catch (err) {
      log.warn({ err }, "Instance deregistration failed");
    }
    await app.close();
    await db.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.fatal({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info({ port: config.server.port }, "API listening");
}

main().catch((err: unknown) => {
  log.fatal({ err }, "Server startup failed");
  process.exit(1);
});
