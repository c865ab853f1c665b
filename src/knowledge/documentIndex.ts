// src/knowledge/documentIndex.ts
// Durable document index: name → DocumentRecord, plus the reverse
// collectionName → name map. Persisted as one JSON file.
//
// The in-memory view is a read-through cache; callers refresh() it from disk
// before reads that must observe other writers (searches). A refresh whose
// read overlaps a local mutation discards what it read.
// Older index files kept the documents mapping under a top-level "pdfs" key
// and used snake_case record fields; both are migrated on load and the file
// is rewritten.

import { promises as fs } from "node:fs";
import path from "node:path";
import { createLogger } from "../observability/logger";
import { isNotFound, writeFileAtomic } from "../utils/fs";
import { errorMessage } from "./errors";
import {
  CHUNKING_METHOD,
  type DocumentRecord,
  type KnowledgeBaseIndexData,
} from "./types";

const log = createLogger("knowledge/documentIndex");

/* ============= Parsing ============= */

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pickString(obj: JsonObject, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

function pickNumber(obj: JsonObject, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "number" && Number.isFinite(v)) return v;
  }
  return undefined;
}

/** Legacy "indexed_at" held an mtime in epoch seconds as a string. */
function normalizeTimestamp(raw: string | undefined): string {
  if (!raw) return new Date(0).toISOString();
  if (/^\d+(\.\d+)?$/.test(raw)) {
    return new Date(Math.round(Number(raw) * 1000)).toISOString();
  }
  return raw;
}

/**
 * Accepts both the current camelCase record and the legacy snake_case one.
 * Returns null for entries without a collection name.
 */
export function parseDocumentRecord(name: string, raw: unknown): DocumentRecord | null {
  if (!isObject(raw)) return null;

  const collectionName = pickString(raw, "collectionName", "collection_name");
  if (!collectionName) return null;

  const sourcePath = pickString(raw, "sourcePath", "file_path") ?? name;
  const fileType =
    pickString(raw, "fileType", "file_type") ??
    path.extname(name).replace(/^\./, "").toLowerCase();

  return {
    name,
    collectionName,
    sourcePath,
    fileType,
    fileSizeBytes: pickNumber(raw, "fileSizeBytes", "file_size") ?? 0,
    textLength: pickNumber(raw, "textLength", "text_length") ?? 0,
    indexedAtTimestamp: normalizeTimestamp(
      pickString(raw, "indexedAtTimestamp", "indexed_at")
    ),
    chunkingMethod: CHUNKING_METHOD,
    chunkCount: pickNumber(raw, "chunkCount", "chunk_count") ?? 0,
  };
}

const RECORD_KEYS = new Set([
  "name",
  "collectionName",
  "collection_name",
  "sourcePath",
  "file_path",
  "fileType",
  "file_type",
  "fileSizeBytes",
  "file_size",
  "textLength",
  "text_length",
  "indexedAtTimestamp",
  "indexed_at",
  "chunkingMethod",
  "chunking_method",
  "chunkCount",
  "chunk_count",
]);

/** Per-record fields parseDocumentRecord does not read. */
export function unknownRecordFields(raw: unknown): JsonObject {
  const out: JsonObject = {};
  if (!isObject(raw)) return out;
  for (const [k, v] of Object.entries(raw)) {
    if (!RECORD_KEYS.has(k)) out[k] = v;
  }
  return out;
}

export interface ParsedIndex {
  data: KnowledgeBaseIndexData;
  /** top-level fields this module does not own, written back unchanged */
  extras: JsonObject;
  /** per-record fields this module does not own, keyed by document name */
  recordExtras: Record<string, JsonObject>;
  migrated: boolean;
}

export function parseIndexFile(raw: unknown): ParsedIndex {
  const source: JsonObject = isObject(raw) ? { ...raw } : {};
  let migrated = false;

  if ("pdfs" in source && !("documents" in source)) {
    source.documents = source.pdfs;
    delete source.pdfs;
    migrated = true;
  }

  const { documents: rawDocs, collections: rawCollections, ...extras } = source;
  const documents: Record<string, DocumentRecord> = {};
  const recordExtras: Record<string, JsonObject> = {};

  if (isObject(rawDocs)) {
    for (const [name, value] of Object.entries(rawDocs)) {
      const record = parseDocumentRecord(name, value);
      if (!record) {
        log.warn({ name }, "Dropping index entry without a collection name");
        migrated = true;
        continue;
      }
      if (!isObject(value) || !("collectionName" in value)) migrated = true;
      documents[name] = record;
      const unknown = unknownRecordFields(value);
      if (Object.keys(unknown).length > 0) recordExtras[name] = unknown;
    }
  }

  // The reverse map is rebuilt from the records so the two never disagree.
  const collections: Record<string, string> = {};
  for (const record of Object.values(documents)) {
    collections[record.collectionName] = record.name;
  }
  if (!isObject(rawCollections)) {
    migrated = migrated || rawDocs !== undefined;
  } else {
    const before = Object.keys(rawCollections).sort().join("\n");
    const after = Object.keys(collections).sort().join("\n");
    if (before !== after) migrated = true;
  }

  return { data: { documents, collections }, extras, recordExtras, migrated };
}

/* ============= Store ============= */

export class DocumentIndexStore {
  private data: KnowledgeBaseIndexData = { documents: {}, collections: {} };
  private extras: JsonObject = {};
  private recordExtras: Record<string, JsonObject> = {};
  /** bumped by every in-memory mutation */
  private generation = 0;
  /** set while the last write failed; refresh() retries the write instead of reading */
  private dirty = false;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Replace the in-memory view with the file's contents.
   * A missing file yields an empty index. An unreadable or corrupt file is
   * logged and the current view is kept. Migrated files are rewritten.
   * While an earlier write is outstanding the in-memory view wins: the write
   * is retried and nothing is read. A mutation made while the file was being
   * read also wins: the read is discarded and `loaded` is false.
   */
  async refresh(): Promise<{ loaded: boolean; migrated: boolean }> {
    if (this.dirty) {
      const written = await this.persist();
      return { loaded: written, migrated: false };
    }

    const startedAt = this.generation;
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        if (this.generation !== startedAt) return { loaded: false, migrated: false };
        this.data = { documents: {}, collections: {} };
        this.extras = {};
        this.recordExtras = {};
        return { loaded: true, migrated: false };
      }
      log.error({ err, file: this.filePath }, "Failed to read document index");
      return { loaded: false, migrated: false };
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.error({ err, file: this.filePath }, "Document index is not valid JSON");
      return { loaded: false, migrated: false };
    }

    if (this.generation !== startedAt) {
      log.debug({ file: this.filePath }, "Index changed during refresh; keeping in-memory view");
      return { loaded: false, migrated: false };
    }

    const parsed = parseIndexFile(json);
    this.data = parsed.data;
    this.extras = parsed.extras;
    this.recordExtras = parsed.recordExtras;

    if (parsed.migrated) {
      log.info({ file: this.filePath }, "Migrated document index to current schema");
      await this.persist();
    }
    return { loaded: true, migrated: parsed.migrated };
  }

  /** Write the index; failures are logged and reported, never thrown. */
  async persist(): Promise<boolean> {
    const documents: Record<string, JsonObject> = {};
    for (const [name, record] of Object.entries(this.data.documents)) {
      documents[name] = { ...this.recordExtras[name], ...record };
    }
    const body = {
      ...this.extras,
      documents,
      collections: this.data.collections,
    };
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(body, null, 2));
      this.dirty = false;
      return true;
    } catch (err) {
      this.dirty = true;
      log.error({ err: errorMessage(err), file: this.filePath }, "Failed to persist document index");
      return false;
    }
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.documents, name);
  }

  get(name: string): DocumentRecord | undefined {
    return this.has(name) ? this.data.documents[name] : undefined;
  }

  names(): string[] {
    return Object.keys(this.data.documents);
  }

  records(): DocumentRecord[] {
    return Object.values(this.data.documents);
  }

  size(): number {
    return this.names().length;
  }

  nameForCollection(collectionName: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.data.collections, collectionName)
      ? this.data.collections[collectionName]
      : undefined;
  }

  /** Insert or replace; keeps the reverse map consistent. */
  set(record: DocumentRecord): void {
    this.generation++;
    const previous = this.get(record.name);
    if (previous && previous.collectionName !== record.collectionName) {
      delete this.data.collections[previous.collectionName];
    }
    this.data.documents[record.name] = record;
    this.data.collections[record.collectionName] = record.name;
  }

  delete(name: string): DocumentRecord | undefined {
    const record = this.get(name);
    if (!record) return undefined;
    this.generation++;
    delete this.data.documents[name];
    delete this.recordExtras[name];
    delete this.data.collections[record.collectionName];
    return record;
  }

  clear(): void {
    this.generation++;
    this.data = { documents: {}, collections: {} };
    this.recordExtras = {};
  }

  snapshot(): KnowledgeBaseIndexData {
    return {
      documents: { ...this.data.documents },
      collections: { ...this.data.collections },
    };
  }
}
