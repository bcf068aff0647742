// src/app.ts
// Fastify application wiring. Kept apart from server.ts so tests can build
// the app with fake dependencies and drive it through app.inject().

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import type { MetricsAggregator } from "./metrics/aggregator.js";
import type { InstanceRegistry } from "./instances/registry.js";
import type { HealthChecker } from "./observability/healthCheck.js";
import { getLogLevel, registerObservability, requestIdGenerator } from "./observability/index.js";
import { createMetricsRoutes } from "./routes/metrics.js";
import { createHealthRoutes } from "./routes/health.js";

export interface AppDeps {
  aggregator: MetricsAggregator;
  instances: InstanceRegistry;
  health: HealthChecker;
  /** Fastify's own logger; request logging goes through registerRequestLogger */
  logger?: FastifyServerOptions["logger"];
}

/**
 * Build the app without listening. Plugins load on ready(), listen() or the
 * first inject().
 */
export function createApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: deps.logger ?? { level: getLogLevel() },
    disableRequestLogging: true,
    genReqId: requestIdGenerator,
  });

  // Register observability hooks (request ID, request logging, timing)
  registerObservability(app);

  void app.register(createMetricsRoutes({ aggregator: deps.aggregator, instances: deps.instances }));
  void app.register(createHealthRoutes(deps.health));

  return app;
}
