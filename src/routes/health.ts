// src/routes/health.ts
// Health check endpoints with Kubernetes probe support.
// - GET /health       - Full status with dependency checks
// - GET /health/ready - Readiness probe
// - GET /health/live  - Liveness probe

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { HealthChecker } from "../observability/healthCheck.js";

/* ---------- Route Registration ---------- */
export function createHealthRoutes(health: HealthChecker) {
  return async function healthRoutes(app: FastifyInstance) {
    /**
     * GET /health
     * 200 while healthy or degraded, 503 when unhealthy
     */
    app.get("/health", async (_req: FastifyRequest, reply: FastifyReply) => {
      const status = await health.getHealthStatus();
      return reply.code(status.status === "unhealthy" ? 503 : 200).send(status);
    });

    app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
      const ready = await health.isReady();
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get("/health/live", async (_req: FastifyRequest, reply: FastifyReply) => {
      const alive = await health.isAlive();
      return reply.code(alive ? 200 : 503).send({ alive });
    });
  };
}
