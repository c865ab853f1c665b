// src/knowledge/types.ts
// Shared types for the document index, retrieval and lifecycle operations.

import type { KnowledgeErrorCode } from "./errors";

/* ============= Document Index ============= */

export const CHUNKING_METHOD = "recursive_character" as const;

export interface DocumentRecord {
  name: string;
  collectionName: string;
  sourcePath: string;
  /** lower-case extension without the dot */
  fileType: string;
  fileSizeBytes: number;
  textLength: number;
  indexedAtTimestamp: string;
  chunkingMethod: typeof CHUNKING_METHOD;
  chunkCount: number;
}

export interface KnowledgeBaseIndexData {
  documents: Record<string, DocumentRecord>;
  collections: Record<string, string>;
}

/* ============= Lifecycle ============= */

export interface ErrorInfo {
  code: KnowledgeErrorCode;
  message: string;
}

export interface IndexResult {
  name: string;
  success: boolean;
  collectionName?: string;
  chunkCount?: number;
  /** true when the name was already indexed and no work was done */
  skipped?: boolean;
  error?: ErrorInfo;
  /** false only when an index write was attempted and failed; in-memory state is still updated */
  persisted: boolean;
}

export interface BatchIndexResult {
  results: IndexResult[];
  succeeded: number;
  failed: number;
}

export interface RebuildResult extends BatchIndexResult {
  deletedCollections: string[];
  /**
   * collections that could not be deleted; indexing still proceeds.
   * A "listCollections: ..." entry means the rebuild stopped before any change.
   */
  collectionErrors: string[];
}

export interface RemoveResult {
  name: string;
  removed: boolean;
  error?: ErrorInfo;
  persisted: boolean;
}

export interface ReconcileResult {
  removedDocuments: string[];
  removedCollections: string[];
  errors: string[];
  persisted: boolean;
}

export interface KnowledgeBaseStatus {
  totalFiles: number;
  indexedDocuments: number;
  pendingFiles: string[];
  supportedExtensions: readonly string[];
}

export type KnowledgeBaseChange =
  | { kind: "indexed"; name: string }
  | { kind: "removed"; name: string }
  | { kind: "rebuilt" }
  | { kind: "reconciled"; removed: string[] };

export type ChangeListener = (change: KnowledgeBaseChange) => void;

/* ============= Retrieval ============= */

export interface RetrievalCandidate {
  documentName: string;
  chunkText: string;
  distance: number | null;
}

export interface SearchDetails {
  /** basename of the best-matching document; empty when there is no single winner */
  sources: string[];
  totalSourcesChecked: number;
  failedCollections: string[];
}

export const GENERAL_KNOWLEDGE_SOURCE = "general_knowledge";
export const MULTIPLE_DOCUMENTS_SOURCE = "multiple_documents";

interface SearchResultBase {
  answer: string;
  source: string;
  confidence: number;
  details: SearchDetails;
}

export type SearchResult =
  | (SearchResultBase & { status: "answered" })
  | (SearchResultBase & { status: "no_match" })
  | (SearchResultBase & { status: "no_documents"; error: ErrorInfo })
  | (SearchResultBase & { status: "not_indexed"; error: ErrorInfo })
  | (SearchResultBase & { status: "failed"; error: ErrorInfo });

export type SearchStatus = SearchResult["status"];
