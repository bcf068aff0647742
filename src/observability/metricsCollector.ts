// src/observability/metricsCollector.ts
// Metrics collection hooks
//
// Fastify hooks that time every request, and the periodic refresh that
// copies a MetricsReport into the Prometheus gauges.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { MetricsAggregator } from "../metrics/aggregator.js";
import { scopeLabel } from "../metrics/scope.js";
import { ALL_WORKSPACES, type WorkspaceScope } from "../metrics/types.js";
import {
  recordHttpRequest,
  recordRefreshFailure,
  updateReportMetrics,
  METRICS_ENABLED,
} from "./metrics.js";
import { createLogger } from "./logger.js";

const log = createLogger("metrics");

/* ---------- Request Timing ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Register metrics collection hooks with Fastify
 */
export function registerMetricsCollector(app: FastifyInstance): void {
  if (!METRICS_ENABLED) {
    log.info("Metrics collection disabled");
    return;
  }

  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    // Route pattern (with placeholders) when the request matched a route
    const routePattern = req.routeOptions.url ?? req.url;
    recordHttpRequest(req.method, routePattern, reply.statusCode, duration);

    requestStartTimes.delete(req);
  });

  log.info("Metrics collection enabled");
}

/* ---------- Periodic Gauge Updates ---------- */

/**
 * Compute one report and copy it into the gauges.
 * On failure the previous gauge values stay in place and the failure
 * counter goes up; returns whether the refresh succeeded.
 */
export async function refreshGauges(
  aggregator: MetricsAggregator,
  scope: WorkspaceScope = ALL_WORKSPACES
): Promise<boolean> {
  try {
    const report = await aggregator.computeMetrics(scope);
    updateReportMetrics(report, scopeLabel(scope));
    return true;
  } catch (err) {
    recordRefreshFailure();
    log.error({ err, scope: scopeLabel(scope) }, "Failed to update gauge metrics");
    return false;
  }
}

let gaugeUpdateInterval: ReturnType<typeof setInterval> | null = null;

export interface GaugeUpdateOptions {
  intervalMs: number;
  scope?: WorkspaceScope;
}

/**
 * Start periodic gauge refreshes: one immediately, then every interval.
 */
export function startGaugeUpdates(
  aggregator: MetricsAggregator,
  { intervalMs, scope = ALL_WORKSPACES }: GaugeUpdateOptions
): void {
  if (!METRICS_ENABLED) return;

  stopGaugeUpdates();

  let inFlight = false;
  const tick = async () => {
    // A slow database must not pile up overlapping refreshes.
    if (inFlight) return;
    inFlight = true;
    try {
      await refreshGauges(aggregator, scope);
    } finally {
      inFlight = false;
    }
  };

  void tick();
  gaugeUpdateInterval = setInterval(() => void tick(), intervalMs);
  gaugeUpdateInterval.unref();

  log.info({ intervalMs, scope: scopeLabel(scope) }, "Started periodic gauge updates");
}

export function stopGaugeUpdates(): void {
  if (gaugeUpdateInterval) {
    clearInterval(gaugeUpdateInterval);
    gaugeUpdateInterval = null;
  }
}
