// src/observability/requestLogger.ts
// Request/response logging with timing.
// Fastify's own per-request logging is disabled in favour of these hooks.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger.js";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  workspace?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

/** `?workspace=` when it is a single value */
function extractWorkspace(req: FastifyRequest): string | undefined {
  const query = req.query;
  if (typeof query !== "object" || query === null || !("workspace" in query)) {
    return undefined;
  }
  return typeof query.workspace === "string" ? query.workspace : undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    workspace: extractWorkspace(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

/**
 * Logger bound to one request's context
 */
export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Logs request start (debug), completion with status and duration, and
 * handler errors.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createRequestLogger(req).debug("request started");
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;

    const log = createChildLogger(baseLogger, {
      ...buildRequestContext(req),
      statusCode: reply.statusCode,
      duration,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }

    requestStartTimes.delete(req);
  });

  app.addHook("onError", async (req: FastifyRequest, _reply: FastifyReply, error: Error) => {
    createRequestLogger(req).error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}
