// src/observability/index.ts
// Central export point for logging, request ids, metrics and health checks.

/* ---------- Logger ---------- */
export {
  buildLoggerOptions,
  createLogger,
  createChildLogger,
  getLogLevel,
  type LogLevel,
} from "./logger";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId";

/* ---------- Request Logger ---------- */
export { createRequestLogger, registerRequestLogger } from "./requestLogger";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordIndexing,
  setIndexedDocuments,
  recordSearch,
  recordAiRequest,
  recordEligibilityLookup,
  METRICS_ENABLED,
} from "./metrics";

/* ---------- Health Checks ---------- */
export {
  getHealthStatus,
  isReady,
  isAlive,
  type HealthDeps,
  type HealthStatus,
  type HealthCheckResult,
} from "./healthCheck";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId";
import { registerRequestLogger } from "./requestLogger";

/** Install request-id and request-logging hooks (the latter also records HTTP metrics). */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
}
