// src/routes/health.ts
// - GET /health        full status with dependency checks
// - GET /health/ready  200 when every dependency is up, 503 otherwise
// - GET /health/live   200 unless every dependency is down

import type { FastifyPluginAsync } from "fastify";
import { getHealthStatus, isAlive, isReady, type HealthDeps } from "../observability/healthCheck";

export function createHealthRoutes(deps: HealthDeps): FastifyPluginAsync {
  return async (app) => {
    app.get("/health", async (_req, reply) => {
      const health = await getHealthStatus(deps);
      return reply.code(health.status === "unhealthy" ? 503 : 200).send(health);
    });

    app.get("/health/ready", async (_req, reply) => {
      const ready = await isReady(deps);
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get("/health/live", async (_req, reply) => {
      const alive = await isAlive(deps);
      return reply.code(alive ? 200 : 503).send({ alive });
    });
  };
}
