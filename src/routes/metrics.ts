// src/routes/metrics.ts
// GET /metrics  Prometheus exposition of the shared registry.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { registry } from "../observability/metrics";

export default async function metricsRoutes(app: FastifyInstance) {
  app.get("/metrics", async (_req: FastifyRequest, reply: FastifyReply) => {
    try {
      const metrics = await registry.metrics();
      return reply.header("Content-Type", registry.contentType).send(metrics);
    } catch (err) {
      app.log.error({ err }, "Failed to collect metrics");
      return reply.code(500).send({ error: "Failed to collect metrics" });
    }
  });
}
