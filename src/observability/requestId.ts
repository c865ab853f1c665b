// src/observability/requestId.ts
// Request ID generation and X-Request-ID passthrough.

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";

/* ---------- Constants ---------- */
export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21; // nanoid default

export function generateRequestId(): string {
  return nanoid(REQUEST_ID_LENGTH);
}

/**
 * Accept an upstream X-Request-ID or mint a new one.
 * genReqId receives the raw IncomingMessage, not a FastifyRequest.
 */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];

  if (typeof incomingId === "string" && incomingId.length > 0) {
    return incomingId;
  }

  return generateRequestId();
}

/**
 * Echo the request id back on every response
 */
export function registerRequestIdHook(app: FastifyInstance): void {
  app.addHook("onSend", async (req: FastifyRequest, reply: FastifyReply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });
}
