// src/routes/http.ts
// Shared reply helpers: body validation and error-code → status mapping.

import type { FastifyReply } from "fastify";
import type { KnowledgeErrorCode } from "../knowledge/errors";
import type { ErrorInfo, SearchStatus } from "../knowledge/types";

const STATUS_BY_CODE: Record<KnowledgeErrorCode, number> = {
  document_not_found: 404,
  not_indexed: 404,
  identifier_not_found: 404,
  unsupported_file_type: 400,
  extraction_failed: 422,
  no_documents_indexed: 409,
  storage_failure: 500,
  completion_failed: 502,
};

const STATUS_BY_SEARCH: Record<SearchStatus, number> = {
  answered: 200,
  no_match: 200,
  no_documents: 200,
  not_indexed: 404,
  failed: 502,
};

export function statusForError(error: ErrorInfo): number {
  return STATUS_BY_CODE[error.code];
}

export function statusForSearch(status: SearchStatus): number {
  return STATUS_BY_SEARCH[status];
}

export function sendError(reply: FastifyReply, status: number, error: string, message: string) {
  return reply.code(status).send({ error, message });
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Non-empty trimmed string field, else null. */
export function stringField(body: unknown, key: string): string | null {
  if (!isRecord(body)) return null;
  const v = body[key];
  return typeof v === "string" && v.trim() ? v.trim() : null;
}
