// src/observability/index.ts
// Central export point for logging, metrics and health checks.

import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId.js";
import { registerRequestLogger } from "./requestLogger.js";
import { registerMetricsCollector } from "./metricsCollector.js";

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger.js";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  requestIdGenerator,
  registerRequestIdHook,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId.js";

/* ---------- Request Logger ---------- */
export { createRequestLogger, registerRequestLogger } from "./requestLogger.js";

/* ---------- Metrics ---------- */
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  documentsByStatus,
  queueDepth,
  workspacesTotal,
  graphNodes,
  graphEdges,
  metricsRefreshFailures,
  metricsLastRefresh,
  recordHttpRequest,
  updateReportMetrics,
  recordRefreshFailure,
  METRICS_ENABLED,
} from "./metrics.js";

export {
  registerMetricsCollector,
  refreshGauges,
  startGaugeUpdates,
  stopGaugeUpdates,
  type GaugeUpdateOptions,
} from "./metricsCollector.js";

/* ---------- Health Checks ---------- */
export {
  createHealthChecker,
  type HealthChecker,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck.js";

/* ---------- Combined Registration ---------- */

/**
 * Register the request-scoped observability hooks.
 * Gauge refreshes are started separately, once the aggregator exists.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
  registerMetricsCollector(app);
}
