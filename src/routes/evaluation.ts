// src/routes/evaluation.ts
// Retrieval evaluation API
//
// - POST /kb/evaluations             run ({ testCases? }, default sample set) and persist
// - GET  /kb/evaluations             saved runs, newest first
// - GET  /kb/evaluations/:filename   one saved run

import type { FastifyPluginAsync } from "fastify";
import {
  InvalidRunFilename,
  parseEvaluationCases,
  runEvaluation,
  sampleTestQueries,
} from "../evaluation/harness";
import type { AppServices } from "../services";
import { isRecord, sendError } from "./http";

export function createEvaluationRoutes(services: AppServices): FastifyPluginAsync {
  const { kb, evaluations } = services;

  return async (fastify) => {
    fastify.post("/kb/evaluations", async (req, reply) => {
      const raw = isRecord(req.body) ? req.body.testCases : undefined;
      const cases = raw === undefined ? sampleTestQueries() : parseEvaluationCases(raw);
      if (cases === null) {
        return sendError(
          reply,
          400,
          "invalid_test_cases",
          "testCases must be a list of { query, expectedAnswer, expectedSources?, documentName? }"
        );
      }

      const run = await runEvaluation(kb, cases);
      const saved = await evaluations.saveRun(run);
      return { run, saved };
    });

    fastify.get("/kb/evaluations", async () => ({ runs: await evaluations.listRuns() }));

    fastify.get<{ Params: { filename: string } }>("/kb/evaluations/:filename", async (req, reply) => {
      try {
        const run = await evaluations.loadRun(req.params.filename);
        if (!run) {
          return sendError(reply, 404, "run_not_found", `No evaluation run ${req.params.filename}`);
        }
        return run;
      } catch (err) {
        if (err instanceof InvalidRunFilename) {
          return sendError(reply, 400, "invalid_filename", err.message);
        }
        throw err;
      }
    });
  };
}
