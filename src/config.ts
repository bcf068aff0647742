/* src/config.ts
   Centralized config read from the environment */
import os from 'node:os';
import path from 'node:path';
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = Number.parseInt(env(name), 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
};

export type DatabaseDriver = 'sqlite' | 'postgresql';

// Determine database driver from DATABASE_URL scheme
const databaseUrl = env('DATABASE_URL', 'sqlite://local');
const databaseDriver: DatabaseDriver = databaseUrl.startsWith('postgres')
  ? 'postgresql'
  : 'sqlite';

const metricsWorkspace = process.env.METRICS_WORKSPACE;

export const config = {
  // ── HTTP ─────────────────────────────────────────────────────────
  server: {
    host: env('HOST', '0.0.0.0'),
    port: envInt('PORT', 4100),
  },

  // ── Database ─────────────────────────────────────────────────────
  database: {
    url: databaseUrl,
    driver: databaseDriver,
    sqlitePath: path.resolve(process.cwd(), env('DOCGRAPH_DB_PATH', 'data/docgraph.db')),
    poolMax: envInt('DATABASE_POOL_MAX', 10),
  },

  // ── Prometheus export ────────────────────────────────────────────
  metrics: {
    enabled: env('METRICS_ENABLED', 'true') !== 'false',
    prefix: env('METRICS_PREFIX', 'docgraph'),
    refreshIntervalMs: envInt('METRICS_REFRESH_INTERVAL_MS', 30_000),
    // undefined = gauges cover every workspace
    workspace: metricsWorkspace === undefined ? null : metricsWorkspace,
  },

  // ── Instance registry ────────────────────────────────────────────
  instances: {
    id: env('INSTANCE_ID', `${os.hostname()}-${process.pid}`),
    hostname: os.hostname(),
    heartbeatIntervalMs: envInt('INSTANCE_HEARTBEAT_INTERVAL_MS', 15_000),
    staleAfterMs: envInt('INSTANCE_STALE_AFTER_MS', 60_000),
  },

  health: {
    timeoutMs: envInt('HEALTH_CHECK_TIMEOUT', 5_000),
  },
} as const;
