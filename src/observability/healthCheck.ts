// src/observability/healthCheck.ts
// Dependency health checks backing /health, /health/ready and /health/live.
//
// storage: the storage root is writable
// vectorStore: the vector store answers listCollections()

import { promises as fs, constants as fsConstants } from "node:fs";
import type { VectorStore } from "../vectorstore/types";
import { createLogger } from "./logger";

const log = createLogger("health");

/* ---------- Types ---------- */

export interface HealthCheckResult {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    storage: HealthCheckResult;
    vectorStore: HealthCheckResult;
  };
}

export interface HealthDeps {
  storageRoot: string;
  vectorStore: Pick<VectorStore, "listCollections" | "driver">;
  timeoutMs?: number;
}

/* ---------- Configuration ---------- */

const HEALTH_CHECK_TIMEOUT = Number(process.env.HEALTH_CHECK_TIMEOUT) || 5000;
const SERVICE_VERSION = process.env.npm_package_version || "unknown";
const startTime = Date.now();

/* ---------- Individual Health Checks ---------- */

async function probe(name: string, check: () => Promise<unknown>): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    await check();
    return { status: "up", latency: Date.now() - start };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ err: message, check: name }, "Health check failed");
    return { status: "down", latency: Date.now() - start, error: message };
  }
}

function checkStorage(root: string): Promise<HealthCheckResult> {
  return probe("storage", () => fs.access(root, fsConstants.W_OK));
}

function checkVectorStore(store: HealthDeps["vectorStore"]): Promise<HealthCheckResult> {
  return probe(`vectorStore:${store.driver}`, () => store.listCollections());
}

/* ---------- Timeout Wrapper ---------- */

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, fallback: T): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<T>((resolve) => {
    timeoutId = setTimeout(() => resolve(fallback), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/* ---------- Combined Health Check ---------- */

export async function getHealthStatus(deps: HealthDeps): Promise<HealthStatus> {
  const timeoutMs = deps.timeoutMs ?? HEALTH_CHECK_TIMEOUT;
  const timedOut: HealthCheckResult = { status: "down", error: "Timeout" };

  const [storage, vectorStore] = await Promise.all([
    withTimeout(checkStorage(deps.storageRoot), timeoutMs, timedOut),
    withTimeout(checkVectorStore(deps.vectorStore), timeoutMs, timedOut),
  ]);

  const checks = { storage, vectorStore };
  const results = Object.values(checks);

  let status: HealthStatus["status"];
  if (results.every((c) => c.status === "up")) {
    status = "healthy";
  } else if (results.every((c) => c.status === "down")) {
    status = "unhealthy";
  } else {
    status = "degraded";
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    version: SERVICE_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
  };
}

/* ---------- Probes ---------- */

/** Ready only when every dependency is up. */
export async function isReady(deps: HealthDeps): Promise<boolean> {
  return (await getHealthStatus(deps)).status === "healthy";
}

/** Alive unless every dependency is down. */
export async function isAlive(deps: HealthDeps): Promise<boolean> {
  return (await getHealthStatus(deps)).status !== "unhealthy";
}
