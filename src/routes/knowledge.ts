// src/routes/knowledge.ts
// Knowledge base API
//
// Endpoints:
// - GET    /kb/status                  directory vs. index summary
// - GET    /kb/documents               indexed records
// - GET    /kb/documents/:name         one record
// - POST   /kb/documents               upload (multipart "file") and index
// - POST   /kb/documents/:name/index   (re-)index one file
// - DELETE /kb/documents/:name         remove from the index and vector store
// - POST   /kb/index                   index the directory ({ onlyNew } → new files only)
// - POST   /kb/rebuild                 destructive rebuild, body { confirm: true }
// - POST   /kb/reconcile               drop orphaned records and collections
// - POST   /kb/search                  { question, document? }
// - POST   /kb/eligibility             { items: [{ description, amount }] }
// - POST   /kb/eligibility/bill        upload a bill (multipart "file")

import path from "node:path";
import type { FastifyPluginAsync } from "fastify";
import type { BillItem } from "../knowledge/eligibility";
import { KnowledgeBaseError, UnsupportedFileType, toErrorInfo } from "../knowledge/errors";
import { RebuildNotConfirmed } from "../knowledge/knowledgeBase";
import { createRequestLogger } from "../observability/requestLogger";
import type { AppServices } from "../services";
import { writeFileAtomic } from "../utils/fs";
import { isRecord, sendError, statusForError, statusForSearch, stringField } from "./http";

/* ---------- Helpers ---------- */

function parseItems(body: unknown): BillItem[] | null {
  if (!isRecord(body) || !Array.isArray(body.items)) return null;
  const items: BillItem[] = [];
  for (const raw of body.items) {
    const description = stringField(raw, "description");
    if (description === null || !isRecord(raw)) return null;
    const amount = typeof raw.amount === "string" ? Number(raw.amount) : raw.amount;
    if (typeof amount !== "number" || !Number.isFinite(amount)) return null;
    items.push({ description, amount });
  }
  return items;
}

/* ---------- Routes ---------- */

export function createKnowledgeRoutes(services: AppServices): FastifyPluginAsync {
  const { kb, eligibility } = services;

  return async (fastify) => {
    fastify.get("/kb/status", async () => kb.getStatus());

    fastify.get("/kb/documents", async () => ({ documents: kb.getIndexedRecords() }));

    fastify.get<{ Params: { name: string } }>("/kb/documents/:name", async (req, reply) => {
      const record = kb.getDocumentInfo(req.params.name);
      if (!record) {
        return sendError(reply, 404, "not_indexed", `Document ${req.params.name} is not indexed`);
      }
      return record;
    });

    /**
     * POST /kb/documents
     * Saves the upload into the documents directory under its base name,
     * replacing a file of the same name, then indexes it.
     */
    fastify.post("/kb/documents", async (req, reply) => {
      const file = await req.file();
      if (!file) {
        return sendError(reply, 400, "file_required", 'No file uploaded (field "file")');
      }

      const name = path.basename(file.filename);
      if (!name || !kb.isSupported(name)) {
        const err = new UnsupportedFileType(name || "(unnamed)", path.extname(name).toLowerCase());
        return sendError(reply, 400, "unsupported_file_type", err.message);
      }

      const buf = await file.toBuffer();
      await writeFileAtomic(path.join(kb.documentsDir, name), buf);
      createRequestLogger(req).info({ name, bytes: buf.byteLength }, "Stored upload");

      const result = await kb.indexDocument(name);
      if (!result.success && result.error) {
        return reply.code(statusForError(result.error)).send(result);
      }
      return reply.code(201).send(result);
    });

    fastify.post<{ Params: { name: string } }>("/kb/documents/:name/index", async (req, reply) => {
      const result = await kb.indexDocument(req.params.name);
      if (!result.success && result.error) {
        return reply.code(statusForError(result.error)).send(result);
      }
      return result;
    });

    fastify.delete<{ Params: { name: string } }>("/kb/documents/:name", async (req, reply) => {
      const result = await kb.removeDocument(req.params.name);
      if (!result.removed && result.error) {
        return reply.code(statusForError(result.error)).send(result);
      }
      return result;
    });

    fastify.post("/kb/index", async (req) => {
      const onlyNew = isRecord(req.body) && req.body.onlyNew === true;
      return onlyNew ? kb.autoIndexNewFiles() : kb.indexAllDocuments();
    });

    fastify.post("/kb/rebuild", async (req, reply) => {
      const confirm = isRecord(req.body) && req.body.confirm === true;
      try {
        return await kb.rebuildIndex({ confirm });
      } catch (err) {
        if (err instanceof RebuildNotConfirmed) {
          return sendError(reply, 409, "confirmation_required", err.message);
        }
        throw err;
      }
    });

    fastify.post("/kb/reconcile", async () => kb.reconcile());

    fastify.post("/kb/search", async (req, reply) => {
      const question = stringField(req.body, "question");
      if (question === null) {
        return sendError(reply, 400, "invalid_question", "question must be a non-empty string");
      }
      const document = stringField(req.body, "document");

      const result =
        document === null ? await kb.searchAll(question) : await kb.searchDocument(document, question);
      return reply.code(statusForSearch(result.status)).send(result);
    });

    fastify.post("/kb/eligibility", async (req, reply) => {
      const items = parseItems(req.body);
      if (items === null) {
        return sendError(
          reply,
          400,
          "invalid_items",
          "items must be a list of { description: string, amount: number }"
        );
      }
      return eligibility.checkItems(items);
    });

    fastify.post("/kb/eligibility/bill", async (req, reply) => {
      const file = await req.file();
      if (!file) {
        return sendError(reply, 400, "file_required", 'No file uploaded (field "file")');
      }
      const buf = await file.toBuffer();
      try {
        return await eligibility.checkBillFile(buf, path.basename(file.filename));
      } catch (err) {
        if (err instanceof KnowledgeBaseError) {
          return sendError(reply, statusForError(toErrorInfo(err)), err.code, err.message);
        }
        throw err;
      }
    });
  };
}
