// src/observability/requestLogger.ts
// Request/response logging with timing, plus HTTP metrics collection.

import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { Logger } from "pino";
import { createLogger, createChildLogger } from "./logger";
import { recordHttpRequest } from "./metrics";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  document?: string;
  [key: string]: unknown;
}

/* ---------- Context Extraction ---------- */

function extractDocumentName(req: FastifyRequest): string | undefined {
  const params = req.params;
  if (params && typeof params === "object" && "name" in params) {
    const name = params.name;
    return typeof name === "string" ? name : undefined;
  }
  return undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  return {
    requestId: req.id,
    method: req.method,
    url: req.url,
    document: extractDocumentName(req),
  };
}

/* ---------- Logger Factory ---------- */

const baseLogger = createLogger("http");

/**
 * Request-scoped logger carrying the request id and document name
 */
export function createRequestLogger(req: FastifyRequest): Logger {
  return createChildLogger(baseLogger, buildRequestContext(req));
}

/* ---------- Fastify Hook Registration ---------- */

const requestStartTimes = new WeakMap<FastifyRequest, number>();

export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
    createRequestLogger(req).debug("request started");
  });

  app.addHook(
    "onResponse",
    async (req: FastifyRequest, reply: FastifyReply) => {
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

      recordHttpRequest(
        req.method,
        req.routeOptions.url ?? req.url,
        reply.statusCode,
        duration
      );

      requestStartTimes.delete(req);
    }
  );

  app.addHook("onError", async (req: FastifyRequest, _reply, error) => {
    createRequestLogger(req).error(
      {
        err: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      "request error"
    );
  });
}
