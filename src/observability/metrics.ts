// src/observability/metrics.ts
// Prometheus metrics for the knowledge-base service.
//
// Exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "kb";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "knowledge-base-backend",
});

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

/* ---------- Indexing Metrics ---------- */

/**
 * Documents indexed, by outcome
 */
export const documentsIndexedTotal = new Counter({
  name: `${METRICS_PREFIX}_documents_indexed_total`,
  help: "Total number of document indexing attempts",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const indexedDocuments = new Gauge({
  name: `${METRICS_PREFIX}_indexed_documents`,
  help: "Number of documents currently in the document index",
  registers: [registry],
});

/* ---------- Retrieval Metrics ---------- */

export const searchesTotal = new Counter({
  name: `${METRICS_PREFIX}_searches_total`,
  help: "Total number of knowledge-base searches",
  labelNames: ["scope", "status"] as const,
  registers: [registry],
});

export const searchDuration = new Histogram({
  name: `${METRICS_PREFIX}_search_duration_seconds`,
  help: "Knowledge-base search duration in seconds",
  labelNames: ["scope"] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

/* ---------- AI Metrics ---------- */

export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Total number of completion requests",
  labelNames: ["provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "Completion request duration in seconds",
  labelNames: ["provider"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/* ---------- Eligibility Metrics ---------- */

export const eligibilityLookupsTotal = new Counter({
  name: `${METRICS_PREFIX}_eligibility_lookups_total`,
  help: "Eligibility cache lookups by result",
  labelNames: ["result"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });

  httpRequestDuration.observe(
    { method, route: normalizeRoute(route) },
    durationMs / 1000
  );
}

export function recordIndexing(status: "success" | "failure"): void {
  if (!METRICS_ENABLED) return;
  documentsIndexedTotal.inc({ status });
}

export function setIndexedDocuments(count: number): void {
  if (!METRICS_ENABLED) return;
  indexedDocuments.set(count);
}

export function recordSearch(
  scope: "single" | "multi",
  status: string,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  searchesTotal.inc({ scope, status });
  searchDuration.observe({ scope }, durationMs / 1000);
}

export function recordAiRequest(
  provider: string,
  status: "success" | "error",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  aiRequestsTotal.inc({ provider, status });
  aiRequestDuration.observe({ provider }, durationMs / 1000);
}

export function recordEligibilityLookup(result: "hit" | "miss"): void {
  if (!METRICS_ENABLED) return;
  eligibilityLookupsTotal.inc({ result });
}

/* ---------- Route Normalization ---------- */

/**
 * Collapse per-document path segments to keep label cardinality bounded
 */
function normalizeRoute(route: string): string {
  const path = route.split("?")[0];

  return path
    .replace(/\/kb\/documents\/[^/]+/g, "/kb/documents/:name")
    .replace(/\/kb\/evaluations\/[^/]+/g, "/kb/evaluations/:filename");
}

/* ---------- Exports ---------- */
export { METRICS_ENABLED };
