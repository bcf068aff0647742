// src/routes/metrics.ts
// Metrics endpoints
//
// - GET /metrics          Prometheus exposition of the registry
// - GET /metrics/summary  Document/graph report as JSON (?workspace=<id> to scope)
// - GET /metrics/all      Every live instance with its heartbeat metrics, plus totals

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { MetricsAggregator } from "../metrics/aggregator.js";
import { MetricsError } from "../metrics/errors.js";
import { resolveScope } from "../metrics/scope.js";
import { aggregateInstanceMetrics, type InstanceRegistry } from "../instances/registry.js";
import { registry } from "../observability/metrics.js";

export interface MetricsRouteDeps {
  aggregator: MetricsAggregator;
  instances: InstanceRegistry;
}

interface ErrorBody {
  status: "error";
  code: string;
  message: string;
}

function errorBody(err: unknown, fallbackCode: string, fallbackMessage: string): {
  statusCode: number;
  body: ErrorBody;
} {
  if (err instanceof MetricsError) {
    return {
      statusCode: err.statusCode,
      body: { status: "error", code: err.code, message: err.message },
    };
  }
  return {
    statusCode: 503,
    body: { status: "error", code: fallbackCode, message: fallbackMessage },
  };
}

/** `?workspace=` exactly as received: absent, a string, or an array when repeated */
function workspaceParam(req: FastifyRequest): unknown {
  const query = req.query;
  if (typeof query !== "object" || query === null || !("workspace" in query)) {
    return undefined;
  }
  return query.workspace;
}

/* ---------- Route Registration ---------- */
export function createMetricsRoutes({ aggregator, instances }: MetricsRouteDeps) {
  return async function metricsRoutes(app: FastifyInstance) {
    /**
     * GET /metrics
     * All registered metrics in Prometheus text format
     */
    app.get("/metrics", async (_req: FastifyRequest, reply: FastifyReply) => {
      try {
        const metrics = await registry.metrics();
        return reply.header("Content-Type", registry.contentType).send(metrics);
      } catch (err) {
        app.log.error({ err }, "Failed to collect metrics");
        return reply.code(500).send({ error: "Failed to collect metrics" });
      }
    });

    /**
     * GET /metrics/summary?workspace=<id>
     * Fresh report from one storage snapshot. No partial report is ever
     * sent: failures answer with { status: "error" }.
     */
    app.get("/metrics/summary", async (req: FastifyRequest, reply: FastifyReply) => {
      try {
        const scope = resolveScope(workspaceParam(req));
        const report = await aggregator.computeMetrics(scope);
        return reply.send(report);
      } catch (err) {
        const { statusCode, body } = errorBody(err, "STORAGE_UNAVAILABLE", "Metrics unavailable");
        if (statusCode >= 500) {
          req.log.error({ err }, "Failed to compute metrics summary");
        }
        return reply.code(statusCode).send(body);
      }
    });

    /**
     * GET /metrics/all
     * Live instances (heartbeat inside the stale window) and summed metrics
     */
    app.get("/metrics/all", async (req: FastifyRequest, reply: FastifyReply) => {
      try {
        const live = await instances.getAllInstancesWithMetrics();
        return reply.send({
          status: "ok",
          instances: live,
          aggregated: aggregateInstanceMetrics(live),
        });
      } catch (err) {
        req.log.error({ err }, "Failed to read instance registry");
        const { statusCode, body } = errorBody(err, "REGISTRY_UNAVAILABLE", "Instance registry unavailable");
        return reply.code(statusCode).send(body);
      }
    });
  };
}
