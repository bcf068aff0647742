// src/observability/requestId.ts
// Request ID generation for log correlation.
// Accepts an upstream X-Request-ID (e.g. from the scraping proxy) when it
// looks sane, otherwise mints a nanoid.

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "node:http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default
const MAX_INCOMING_ID_LENGTH = 128;
const INCOMING_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Upstream id when present and well-formed, else a fresh one.
 * Oversized or oddly-charactered ids are replaced so they cannot
 * pollute log lines.
 */
export function getOrCreateRequestIdFromMessage(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (
    typeof incomingId === "string" &&
    incomingId.length > 0 &&
    incomingId.length <= MAX_INCOMING_ID_LENGTH &&
    INCOMING_ID_PATTERN.test(incomingId)
  ) {
    return incomingId;
  }

  return generateRequestId();
}

/**
 * Fastify `genReqId` hook; receives the raw IncomingMessage.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  return getOrCreateRequestIdFromMessage(req);
}

/**
 * Echo the request id back on every response
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
