// src/observability/healthCheck.ts
// Health checks for the service's dependencies.
// Supports Kubernetes-style readiness and liveness probes.

import type { DbAdapter } from "../db/types.js";
import { createLogger } from "./logger.js";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: HealthCheckResult;
    schema: HealthCheckResult;
  };
}

export interface HealthChecker {
  getHealthStatus(): Promise<HealthStatus>;
  isReady(): Promise<boolean>;
  isAlive(): Promise<boolean>;
}

/* ---------- Configuration ---------- */

const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Checks ---------- */

async function timed(name: string, probe: () => Promise<boolean>): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    if (await probe()) {
      return { status: "up", latency: Date.now() - start };
    }
    return { status: "down", latency: Date.now() - start, error: "Unexpected query result" };
  } catch (err) {
    log.error({ err, check: name }, "Health check failed");
    return {
      status: "down",
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

/* ---------- Timeout Wrapper ---------- */

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, fallback: T): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<T>((resolve) => {
    timeoutId = setTimeout(() => resolve(fallback), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/* ---------- Combined Health Check ---------- */

/**
 * database: the connection answers `SELECT 1`
 * schema:   the doc_status table is readable (migrations have run)
 *
 * Both up → healthy, both down → unhealthy, otherwise degraded.
 */
export function createHealthChecker(db: DbAdapter, timeoutMs: number): HealthChecker {
  const timeout: HealthCheckResult = { status: "down", error: "Timeout" };

  async function getHealthStatus(): Promise<HealthStatus> {
    const [database, schema] = await Promise.all([
      withTimeout(
        timed("database", async () => {
          const row = await db.queryOne<{ ok: number | string }>("SELECT 1 AS ok");
          return Number(row?.ok) === 1;
        }),
        timeoutMs,
        timeout
      ),
      withTimeout(
        timed("schema", async () => {
          await db.queryAll("SELECT 1 FROM doc_status LIMIT 1");
          return true;
        }),
        timeoutMs,
        timeout
      ),
    ]);

    const checks = { database, schema };
    const results = Object.values(checks);

    let status: HealthStatus["status"];
    if (results.every((c) => c.status === "up")) {
      status = "healthy";
    } else if (results.every((c) => c.status === "down")) {
      status = "unhealthy";
    } else {
      status = "degraded";
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
    };
  }

  return {
    getHealthStatus,
    /** Ready only when every dependency is up */
    async isReady() {
      return (await getHealthStatus()).status === "healthy";
    },
    /** Alive unless everything is down */
    async isAlive() {
      return (await getHealthStatus()).status !== "unhealthy";
    },
  };
}
