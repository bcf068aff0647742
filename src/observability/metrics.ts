// src/observability/metrics.ts
// Prometheus metrics (prom-client)
//
// Document/graph gauges are refreshed from a MetricsReport by the collector;
// GET /metrics serves the registry.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";
import { config } from "../config.js";
import { DOC_STATUSES, type MetricsReport } from "../metrics/types.js";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = config.metrics.prefix;
const METRICS_ENABLED = config.metrics.enabled;

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "docgraph-metrics",
});

// Node.js process metrics (memory, CPU, event loop, ...)
if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Document Metrics ---------- */

/**
 * Documents by processing status (duplicates included)
 */
export const documentsByStatus = new Gauge({
  name: `${METRICS_PREFIX}_documents`,
  help: "Number of documents by processing status",
  labelNames: ["status", "scope"] as const,
  registers: [registry],
});

/**
 * Pending + failed documents, duplicates excluded
 */
export const queueDepth = new Gauge({
  name: `${METRICS_PREFIX}_queue_depth`,
  help: "Pending and failed documents that still need processing (duplicates excluded)",
  labelNames: ["scope"] as const,
  registers: [registry],
});

export const workspacesTotal = new Gauge({
  name: `${METRICS_PREFIX}_workspaces`,
  help: "Number of distinct workspaces with document status records",
  labelNames: ["scope"] as const,
  registers: [registry],
});

/* ---------- Graph Metrics ---------- */

export const graphNodes = new Gauge({
  name: `${METRICS_PREFIX}_graph_nodes`,
  help: "Number of knowledge graph nodes",
  labelNames: ["scope"] as const,
  registers: [registry],
});

export const graphEdges = new Gauge({
  name: `${METRICS_PREFIX}_graph_edges`,
  help: "Number of knowledge graph edges",
  labelNames: ["scope"] as const,
  registers: [registry],
});

/* ---------- Refresh Metrics ---------- */

export const metricsRefreshFailures = new Counter({
  name: `${METRICS_PREFIX}_metrics_refresh_failures_total`,
  help: "Gauge refreshes that failed to read storage",
  registers: [registry],
});

export const metricsLastRefresh = new Gauge({
  name: `${METRICS_PREFIX}_metrics_last_refresh_timestamp_seconds`,
  help: "Unix time of the last successful gauge refresh",
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

/**
 * Record an HTTP request
 */
export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  const normalized = normalizeRoute(route);
  httpRequestsTotal.inc({ method, route: normalized, status_code: statusCode.toString() });
  httpRequestDuration.observe({ method, route: normalized }, durationMs / 1000);
}

/**
 * Copy one report into the gauges. Every status is written, so a bucket
 * that drops to zero reads 0 rather than its last non-zero value.
 */
export function updateReportMetrics(
  report: MetricsReport,
  scope: string,
  now: Date = new Date()
): void {
  if (!METRICS_ENABLED) return;

  for (const status of DOC_STATUSES) {
    documentsByStatus.set({ status, scope }, report.documents[status]);
  }
  queueDepth.set({ scope }, report.queue_depth);
  workspacesTotal.set({ scope }, report.workspace_count);
  graphNodes.set({ scope }, report.graph.nodes);
  graphEdges.set({ scope }, report.graph.edges);
  metricsLastRefresh.set(Math.floor(now.getTime() / 1000));
}

export function recordRefreshFailure(): void {
  if (!METRICS_ENABLED) return;
  metricsRefreshFailures.inc();
}

/* ---------- Route Normalization ---------- */

/**
 * Collapse dynamic path segments to keep label cardinality bounded
 */
export function normalizeRoute(route: string): string {
  const path = route.split("?")[0] ?? route;

  return path
    .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
    .replace(/\/[a-zA-Z0-9_-]{21}(?=\/|$)/g, "/:id") // nanoid
    .replace(/\/\d+(?=\/|$)/g, "/:id");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };
