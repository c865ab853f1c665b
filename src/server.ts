// src/server.ts
// HTTP entry point: Fastify with observability hooks, CORS, multipart
// uploads and the knowledge-base routes.

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { config } from './config';
import { createLogger, getLogLevel, registerObservability, requestIdGenerator } from './observability';
import { createEvaluationRoutes } from './routes/evaluation';
import { createHealthRoutes } from './routes/health';
import { createKnowledgeRoutes } from './routes/knowledge';
import metricsRoutes from './routes/metrics';
import { createServices, type AppServices } from './services';

const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export interface ServerOptions {
  corsOrigins?: readonly string[];
}

export async function buildServer(
  services: AppServices,
  opts: ServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: getLogLevel() },
    disableRequestLogging: true,
    genReqId: requestIdGenerator,
  });

  // Register observability hooks (request ID, request logging, HTTP metrics)
  registerObservability(app);

  await app.register(cors, { origin: [...(opts.corsOrigins ?? config.server.corsOrigins)] });
  await app.register(multipart, { limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  await app.register(createKnowledgeRoutes(services));
  await app.register(createEvaluationRoutes(services));
  await app.register(createHealthRoutes(services.health));
  await app.register(metricsRoutes);

  return app;
}

// --- Main ---
async function main() {
  const services = createServices();
  await services.kb.init();

  const app = await buildServer(services);
  services.indexer.start();

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await services.indexer.stop();
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        startupLogger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.server.port, host: '0.0.0.0' });
  app.log.info({ port: config.server.port }, 'API listening');
}

// Module-level logger for startup errors
const startupLogger = createLogger('startup');

if (require.main === module) {
  main().catch((err) => {
    startupLogger.fatal({ err }, 'Server startup failed');
    process.exit(1);
  });
}
