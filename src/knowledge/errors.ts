// src/knowledge/errors.ts
// Error taxonomy for the knowledge base. Each error carries a stable code
// that survives into structured results and HTTP responses.

export type KnowledgeErrorCode =
  | "extraction_failed"
  | "unsupported_file_type"
  | "document_not_found"
  | "not_indexed"
  | "identifier_not_found"
  | "no_documents_indexed"
  | "storage_failure"
  | "completion_failed";

export class KnowledgeBaseError extends Error {
  readonly code: KnowledgeErrorCode;

  constructor(code: KnowledgeErrorCode, message: string) {
    super(message);
    this.name = "KnowledgeBaseError";
    this.code = code;
  }
}

export class ExtractionFailure extends KnowledgeBaseError {
  constructor(name: string, detail?: string) {
    super(
      "extraction_failed",
      detail
        ? `No text could be extracted from ${name}: ${detail}`
        : `No text could be extracted from ${name}`
    );
    this.name = "ExtractionFailure";
  }
}

export class UnsupportedFileType extends KnowledgeBaseError {
  constructor(name: string, extension: string) {
    super("unsupported_file_type", `Unsupported file type '${extension || "(none)"}' for ${name}`);
    this.name = "UnsupportedFileType";
  }
}

export class DocumentNotFound extends KnowledgeBaseError {
  constructor(name: string) {
    super("document_not_found", `Document ${name} not found in the documents directory`);
    this.name = "DocumentNotFound";
  }
}

export class NotIndexed extends KnowledgeBaseError {
  constructor(name: string) {
    super("not_indexed", `Document ${name} is not indexed`);
    this.name = "NotIndexed";
  }
}

export class IdentifierNotFound extends KnowledgeBaseError {
  constructor(identifier: string) {
    super("identifier_not_found", `No indexed document matches '${identifier}'`);
    this.name = "IdentifierNotFound";
  }
}

export class NoDocumentsIndexed extends KnowledgeBaseError {
  constructor() {
    super("no_documents_indexed", "No documents are indexed in the knowledge base");
    this.name = "NoDocumentsIndexed";
  }
}

export class StorageFailure extends KnowledgeBaseError {
  constructor(message: string) {
    super("storage_failure", message);
    this.name = "StorageFailure";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Project any thrown value onto the `{ code, message }` result shape. */
export function toErrorInfo(
  err: unknown,
  fallback: KnowledgeErrorCode = "storage_failure"
): { code: KnowledgeErrorCode; message: string } {
  if (err instanceof KnowledgeBaseError) {
    return { code: err.code, message: err.message };
  }
  return { code: fallback, message: errorMessage(err) };
}
