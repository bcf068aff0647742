// src/instances/registry.ts
// Registry of running service instances, kept alive by heartbeats.
// Each heartbeat carries a free-form metrics object so that one scrape of
// GET /metrics/all can report every instance plus their totals.
//
// Tables: service_instances

import type { DbAdapter } from "../db/types.js";
import { toCount } from "../metrics/records.js";
import { createLogger } from "../observability/logger.js";

const log = createLogger("instances");

/* ---------- Types ---------- */

export type InstanceMetrics = Record<string, unknown>;

/** Supplies the metrics sent with each heartbeat */
export type InstanceMetricsCollector = () => InstanceMetrics;

// Domain type (camelCase, for API)
export interface InstanceInfo {
  instanceId: string;
  hostname: string;
  lastHeartbeat: string; // ISO string
  drainRequested: boolean;
  processingCount: number;
  pipelineBusy: boolean;
  metrics: InstanceMetrics;
}

// Row type (snake_case, matches DB)
interface InstanceRow {
  instance_id: string;
  hostname: string;
  last_heartbeat: number | string;
  drain_requested: number | string;
  processing_count: number | string;
  pipeline_busy: number | string;
  metrics: unknown;
}

export interface HeartbeatInput {
  processingCount?: number;
  pipelineBusy?: boolean;
  /** Overrides the registered collector for this heartbeat */
  metrics?: InstanceMetrics;
}

export interface InstanceRegistryOptions {
  instanceId: string;
  hostname: string;
  /** Instances whose last heartbeat is older than this are left out of listings */
  staleAfterMs: number;
  now?: () => number;
}

export interface AggregatedInstanceMetrics {
  instance_count: number;
  processing_count: number;
  pipelines_busy: number;
  /** Per-key sums of every numeric metric the instances reported */
  totals: Record<string, number>;
}

/* ---------- Row Parsing ---------- */

/**
 * Metrics arrive as an object (JSONB drivers) or a JSON string (TEXT
 * columns). Null, non-object JSON and unparsable text all become {}.
 */
export function parseInstanceMetrics(value: unknown): InstanceMetrics {
  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch {
      return {};
    }
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function rowToInstance(row: InstanceRow): InstanceInfo {
  return {
    instanceId: row.instance_id,
    hostname: row.hostname,
    lastHeartbeat: new Date(Number(row.last_heartbeat)).toISOString(),
    drainRequested: Number(row.drain_requested) === 1,
    processingCount: toCount(row.processing_count),
    pipelineBusy: Number(row.pipeline_busy) === 1,
    metrics: parseInstanceMetrics(row.metrics),
  };
}

/* ---------- Aggregation ---------- */

/**
 * Sum metrics across instances. A key missing on some instances counts as
 * 0 there; non-numeric values are skipped.
 */
export function aggregateInstanceMetrics(
  instances: readonly InstanceInfo[]
): AggregatedInstanceMetrics {
  // A Map keeps keys such as "__proto__" as ordinary entries.
  const totals = new Map<string, number>();
  let processingCount = 0;
  let pipelinesBusy = 0;

  for (const instance of instances) {
    processingCount += instance.processingCount;
    if (instance.pipelineBusy) pipelinesBusy += 1;

    for (const [key, value] of Object.entries(instance.metrics)) {
      if (typeof value !== "number" || !Number.isFinite(value)) continue;
      totals.set(key, (totals.get(key) ?? 0) + value);
    }
  }

  return {
    instance_count: instances.length,
    processing_count: processingCount,
    pipelines_busy: pipelinesBusy,
    totals: Object.fromEntries(totals),
  };
}

/* ---------- Registry ---------- */

export class InstanceRegistry {
  private metricsCollector: InstanceMetricsCollector | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly db: DbAdapter,
    private readonly options: InstanceRegistryOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get instanceId(): string {
    return this.options.instanceId;
  }

  /** Register the callback whose result rides on every heartbeat */
  setMetricsCollector(collector: InstanceMetricsCollector | null): void {
    this.metricsCollector = collector;
  }

  /** Insert or refresh this instance's row */
  async register(): Promise<void> {
    const now = this.now();
    await this.db.run(
      `INSERT INTO service_instances (
         instance_id, hostname, last_heartbeat, drain_requested,
         processing_count, pipeline_busy, metrics, registered_at
       ) VALUES (?, ?, ?, 0, 0, 0, ?, ?)
       ON CONFLICT (instance_id) DO UPDATE SET
         hostname = excluded.hostname,
         last_heartbeat = excluded.last_heartbeat,
         drain_requested = 0,
         registered_at = excluded.registered_at`,
      [this.options.instanceId, this.options.hostname, now, "{}", now]
    );
    log.info({ instanceId: this.options.instanceId }, "Instance registered");
  }

  /**
   * Refresh the heartbeat. Metrics come from `input.metrics`, else the
   * registered collector, else {}. A row that disappeared is re-created.
   */
  async heartbeat(input: HeartbeatInput = {}): Promise<void> {
    const metrics = input.metrics ?? this.collectMetrics();

    if ((await this.writeHeartbeat(input, metrics)) === 0) {
      log.warn({ instanceId: this.options.instanceId }, "Instance row missing on heartbeat; re-registering");
      await this.register();
      await this.writeHeartbeat(input, metrics);
    }
  }

  private async writeHeartbeat(input: HeartbeatInput, metrics: InstanceMetrics): Promise<number> {
    const result = await this.db.run(
      `UPDATE service_instances
         SET last_heartbeat = ?, processing_count = ?, pipeline_busy = ?, metrics = ?
       WHERE instance_id = ?`,
      [
        this.now(),
        input.processingCount ?? 0,
        input.pipelineBusy ? 1 : 0,
        JSON.stringify(metrics),
        this.options.instanceId,
      ]
    );
    return result.changes;
  }

  private collectMetrics(): InstanceMetrics {
    if (!this.metricsCollector) return {};
    try {
      return this.metricsCollector();
    } catch (err) {
      log.warn({ err }, "Instance metrics collector threw; sending empty metrics");
      return {};
    }
  }

  /** Instances with a heartbeat inside the stale window, with parsed metrics */
  async getAllInstancesWithMetrics(): Promise<InstanceInfo[]> {
    const cutoff = this.now() - this.options.staleAfterMs;
    const rows = await this.db.queryAll<InstanceRow>(
      `SELECT instance_id, hostname, last_heartbeat, drain_requested,
              processing_count, pipeline_busy, metrics
         FROM service_instances
        WHERE last_heartbeat >= ?
        ORDER BY instance_id`,
      [cutoff]
    );
    return rows.map(rowToInstance);
  }

  /** Remove this instance's row (graceful shutdown) */
  async deregister(): Promise<void> {
    await this.db.run(`DELETE FROM service_instances WHERE instance_id = ?`, [
      this.options.instanceId,
    ]);
    log.info({ instanceId: this.options.instanceId }, "Instance deregistered");
  }

  /* ---------- Periodic Heartbeat ---------- */

  startHeartbeat(intervalMs: number): void {
    this.stopHeartbeat();

    const beat = async () => {
      try {
        await this.heartbeat();
      } catch (err) {
        log.error({ err }, "Heartbeat failed");
      }
    };

    this.heartbeatTimer = setInterval(() => void beat(), intervalMs);
    this.heartbeatTimer.unref();
    log.info({ intervalMs }, "Started instance heartbeat");
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}
