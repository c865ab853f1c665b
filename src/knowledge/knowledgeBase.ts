// src/knowledge/knowledgeBase.ts
// Knowledge-base lifecycle and search entry points.
//
// Owns the watched documents directory, the document index and the vector
// collections. Mutations run one at a time through a promise-chain lock;
// searches never take the lock and re-read the index from disk first.

import { promises as fs, type Dirent, type Stats } from "node:fs";
import path from "node:path";
import type { CompletionService } from "../ai/types";
import type { TextExtractor } from "../extraction/textExtractor";
import type { VectorStore } from "../vectorstore/types";
import { createLogger } from "../observability/logger";
import { recordIndexing, setIndexedDocuments } from "../observability/metrics";
import { fileExists, isNotFound } from "../utils/fs";
import { aggregateSearch, type CollectionTarget } from "./aggregator";
import { splitText } from "./chunker";
import { deriveCollectionName } from "./collectionName";
import type { DocumentIndexStore } from "./documentIndex";
import {
  DocumentNotFound,
  ExtractionFailure,
  IdentifierNotFound,
  NoDocumentsIndexed,
  NotIndexed,
  StorageFailure,
  UnsupportedFileType,
  errorMessage,
  toErrorInfo,
} from "./errors";
import { resolveCollection, type ResolverEntry } from "./identifierResolver";
import {
  CHUNKING_METHOD,
  GENERAL_KNOWLEDGE_SOURCE,
  type BatchIndexResult,
  type ChangeListener,
  type DocumentRecord,
  type IndexResult,
  type KnowledgeBaseChange,
  type KnowledgeBaseStatus,
  type RebuildResult,
  type ReconcileResult,
  type RemoveResult,
  type SearchResult,
} from "./types";

const log = createLogger("knowledge/knowledgeBase");

/* ============= Types ============= */

export interface KnowledgeBaseOptions {
  documentsDir: string;
  index: DocumentIndexStore;
  vectorStore: VectorStore;
  extractor: TextExtractor;
  completion: CompletionService;
  supportedExtensions: readonly string[];
  topK: number;
  chunkSize: number;
  chunkOverlap: number;
  /** defaults to () => new Date() */
  clock?: () => Date;
}

export class RebuildNotConfirmed extends Error {
  constructor() {
    super("Rebuilding the index deletes every collection; pass { confirm: true }");
    this.name = "RebuildNotConfirmed";
  }
}

function emptyDetails() {
  return { sources: [], totalSourcesChecked: 0, failedCollections: [] };
}

function summarize(results: IndexResult[]): BatchIndexResult {
  const succeeded = results.filter((r) => r.success).length;
  return { results, succeeded, failed: results.length - succeeded };
}

/* ============= Manager ============= */

export class KnowledgeBaseManager {
  private readonly opts: KnowledgeBaseOptions;
  private readonly clock: () => Date;
  private readonly listeners = new Set<ChangeListener>();
  private lock: Promise<void> = Promise.resolve();

  constructor(opts: KnowledgeBaseOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? (() => new Date());
  }

  get documentsDir(): string {
    return this.opts.documentsDir;
  }

  /** Load the index from disk. Call once before serving. */
  async init(): Promise<void> {
    await fs.mkdir(this.opts.documentsDir, { recursive: true });
    await this.opts.index.refresh();
    setIndexedDocuments(this.opts.index.size());
    log.info(
      { documents: this.opts.index.size(), dir: this.opts.documentsDir },
      "Knowledge base loaded"
    );
  }

  /* ---------- Change notification ---------- */

  /** Subscribe to mutations; returns the unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: KnowledgeBaseChange): void {
    setIndexedDocuments(this.opts.index.size());
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        log.error({ err: errorMessage(err), change: change.kind }, "Change listener threw");
      }
    }
  }

  /* ---------- Locking ---------- */

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /* ---------- Queries over the index ---------- */

  isSupported(name: string): boolean {
    return this.opts.supportedExtensions.includes(path.extname(name).toLowerCase());
  }

  /** Supported files in the documents directory, sorted by name. */
  async listDocumentFiles(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.opts.documentsDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return entries
      .filter((e) => e.isFile() && this.isSupported(e.name))
      .map((e) => e.name)
      .sort();
  }

  isDocumentIndexed(name: string): boolean {
    return this.opts.index.has(name);
  }

  getIndexedDocuments(): string[] {
    return this.opts.index.names();
  }

  getIndexedRecords(): DocumentRecord[] {
    return this.opts.index.records();
  }

  getDocumentInfo(name: string): DocumentRecord | null {
    return this.opts.index.get(name) ?? null;
  }

  async getStatus(): Promise<KnowledgeBaseStatus> {
    const files = await this.listDocumentFiles();
    const indexed = this.getIndexedDocuments();
    return {
      totalFiles: files.length,
      indexedDocuments: indexed.length,
      pendingFiles: files.filter((f) => !this.opts.index.has(f)),
      supportedExtensions: this.opts.supportedExtensions,
    };
  }

  /* ---------- Indexing ---------- */

  indexDocument(name: string): Promise<IndexResult> {
    return this.exclusive(async () => {
      const result = await this.indexOne(name);
      if (result.success) this.emit({ kind: "indexed", name });
      return result;
    });
  }

  indexAllDocuments(): Promise<BatchIndexResult> {
    return this.exclusive(() => this.indexAllUnlocked());
  }

  autoIndexNewFiles(): Promise<BatchIndexResult> {
    return this.exclusive(async () => {
      const files = await this.listDocumentFiles();
      const results: IndexResult[] = [];
      for (const name of files) {
        if (this.opts.index.has(name)) continue;
        log.info({ name }, "Auto-indexing new file");
        const result = await this.indexOne(name);
        if (result.success) this.emit({ kind: "indexed", name });
        results.push(result);
      }
      return summarize(results);
    });
  }

  /**
   * Destructive: deletes every collection, clears the index, re-indexes the
   * directory. When the collections cannot be listed nothing is touched and
   * the failure is reported in `collectionErrors`.
   */
  rebuildIndex(opts: { confirm?: boolean } = {}): Promise<RebuildResult> {
    if (opts.confirm !== true) return Promise.reject(new RebuildNotConfirmed());

    return this.exclusive(async () => {
      const deletedCollections: string[] = [];
      const collectionErrors: string[] = [];

      const listed = await this.listCollectionsReported();
      if (!listed.ok) {
        log.error({ err: listed.error }, "Rebuild aborted: collections could not be listed");
        return {
          ...summarize([]),
          deletedCollections,
          collectionErrors: [`listCollections: ${listed.error}`],
        };
      }

      for (const collection of listed.names) {
        try {
          await this.opts.vectorStore.deleteCollection(collection);
          deletedCollections.push(collection);
        } catch (err) {
          log.warn({ collection, err: errorMessage(err) }, "Failed to delete collection during rebuild");
          collectionErrors.push(`${collection}: ${errorMessage(err)}`);
        }
      }

      this.opts.index.clear();
      await this.opts.index.persist();
      this.emit({ kind: "rebuilt" });

      const batch = await this.indexAllUnlocked();
      log.info(
        { deleted: deletedCollections.length, succeeded: batch.succeeded, failed: batch.failed },
        "Rebuilt knowledge base"
      );
      return { ...batch, deletedCollections, collectionErrors };
    });
  }

  private async listCollectionsReported(): Promise<
    { ok: true; names: string[] } | { ok: false; error: string }
  > {
    try {
      return { ok: true, names: await this.opts.vectorStore.listCollections() };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  private async indexAllUnlocked(): Promise<BatchIndexResult> {
    const files = await this.listDocumentFiles();
    log.info({ files: files.length }, "Indexing documents directory");

    const results: IndexResult[] = [];
    for (const name of files) {
      const existing = this.opts.index.get(name);
      if (existing) {
        results.push({
          name,
          success: true,
          skipped: true,
          collectionName: existing.collectionName,
          chunkCount: existing.chunkCount,
          persisted: true,
        });
        continue;
      }
      const result = await this.indexOne(name);
      if (result.success) this.emit({ kind: "indexed", name });
      results.push(result);
    }
    return summarize(results);
  }

  /** Never throws; every failure becomes an unsuccessful IndexResult. */
  private async indexOne(name: string): Promise<IndexResult> {
    try {
      const result = await this.indexOneOrThrow(name);
      recordIndexing("success");
      return result;
    } catch (err) {
      recordIndexing("failure");
      const error = toErrorInfo(err);
      log.warn({ name, code: error.code, err: error.message }, "Indexing failed");
      return { name, success: false, error, persisted: true };
    }
  }

  private async indexOneOrThrow(name: string): Promise<IndexResult> {
    // Names are bare filenames inside the documents directory.
    if (!name || name !== path.basename(name)) throw new DocumentNotFound(name);

    const filePath = path.join(this.opts.documentsDir, name);
    let stat: Stats;
    try {
      stat = await fs.stat(filePath);
    } catch (err) {
      if (isNotFound(err)) throw new DocumentNotFound(name);
      throw err;
    }
    if (!stat.isFile()) throw new DocumentNotFound(name);

    const ext = path.extname(name).toLowerCase();
    if (!this.isSupported(name)) throw new UnsupportedFileType(name, ext);

    let text: string;
    try {
      text = await this.opts.extractor.extract(filePath);
    } catch (err) {
      throw new ExtractionFailure(name, errorMessage(err));
    }
    if (!text.trim()) throw new ExtractionFailure(name);

    const chunks = splitText(text, {
      chunkSize: this.opts.chunkSize,
      chunkOverlap: this.opts.chunkOverlap,
    });
    const collectionName = deriveCollectionName(name);

    const owner = this.opts.index.nameForCollection(collectionName);
    if (owner !== undefined && owner !== name) {
      throw new StorageFailure(`Collection ${collectionName} already belongs to ${owner}`);
    }

    const previous = this.opts.index.get(name);
    try {
      await this.opts.vectorStore.createOrGetCollection(collectionName, { source: filePath });
      const ids = chunks.map((_, i) => `${collectionName}_${i}`);
      await this.opts.vectorStore.addDocuments(collectionName, chunks, ids);

      if (previous && previous.chunkCount > chunks.length) {
        const stale: string[] = [];
        for (let i = chunks.length; i < previous.chunkCount; i++) {
          stale.push(`${collectionName}_${i}`);
        }
        await this.opts.vectorStore.deleteDocuments(collectionName, stale);
      }
    } catch (err) {
      throw new StorageFailure(`Vector store write failed for ${name}: ${errorMessage(err)}`);
    }

    this.opts.index.set({
      name,
      collectionName,
      sourcePath: filePath,
      fileType: ext.replace(/^\./, ""),
      fileSizeBytes: stat.size,
      textLength: text.length,
      indexedAtTimestamp: this.clock().toISOString(),
      chunkingMethod: CHUNKING_METHOD,
      chunkCount: chunks.length,
    });
    const persisted = await this.opts.index.persist();

    log.info({ name, collectionName, chunks: chunks.length }, "Indexed document");
    return { name, success: true, collectionName, chunkCount: chunks.length, persisted };
  }

  /* ---------- Removal & reconciliation ---------- */

  removeDocument(name: string): Promise<RemoveResult> {
    return this.exclusive(async () => {
      const record = this.opts.index.get(name);
      if (!record) {
        return { name, removed: false, error: toErrorInfo(new NotIndexed(name)), persisted: true };
      }

      try {
        await this.opts.vectorStore.deleteCollection(record.collectionName);
      } catch (err) {
        const error = toErrorInfo(
          new StorageFailure(`Failed to delete collection ${record.collectionName}: ${errorMessage(err)}`)
        );
        log.warn({ name, err: error.message }, "Removal failed");
        return { name, removed: false, error, persisted: true };
      }

      this.opts.index.delete(name);
      const persisted = await this.opts.index.persist();
      this.emit({ kind: "removed", name });
      log.info({ name }, "Removed document");
      return { name, removed: true, persisted };
    });
  }

  /**
   * Drop records whose source file is gone (with their collections) and
   * collections that no record points at.
   */
  reconcile(): Promise<ReconcileResult> {
    return this.exclusive(async () => {
      const removedDocuments: string[] = [];
      const removedCollections: string[] = [];
      const errors: string[] = [];

      for (const record of this.opts.index.records()) {
        if (await fileExists(record.sourcePath)) continue;
        try {
          await this.opts.vectorStore.deleteCollection(record.collectionName);
          removedCollections.push(record.collectionName);
        } catch (err) {
          errors.push(`${record.collectionName}: ${errorMessage(err)}`);
          continue;
        }
        this.opts.index.delete(record.name);
        removedDocuments.push(record.name);
      }

      const listed = await this.listCollectionsReported();
      if (!listed.ok) {
        log.warn({ err: listed.error }, "Skipping orphan sweep: collections could not be listed");
        errors.push(`listCollections: ${listed.error}`);
      }
      for (const collection of listed.ok ? listed.names : []) {
        if (this.opts.index.nameForCollection(collection) !== undefined) continue;
        try {
          await this.opts.vectorStore.deleteCollection(collection);
          removedCollections.push(collection);
        } catch (err) {
          errors.push(`${collection}: ${errorMessage(err)}`);
        }
      }

      const persisted = removedDocuments.length > 0 ? await this.opts.index.persist() : true;
      if (removedDocuments.length > 0 || removedCollections.length > 0) {
        this.emit({ kind: "reconciled", removed: removedDocuments });
      }
      log.info(
        { documents: removedDocuments.length, collections: removedCollections.length },
        "Reconciled knowledge base"
      );
      return { removedDocuments, removedCollections, errors, persisted };
    });
  }

  /* ---------- Search ---------- */

  private searchDeps() {
    return {
      vectorStore: this.opts.vectorStore,
      completion: this.opts.completion,
      topK: this.opts.topK,
    };
  }

  private noDocumentsResult(): SearchResult {
    return {
      status: "no_documents",
      answer: "No documents are indexed. Please index some documents first.",
      source: GENERAL_KNOWLEDGE_SOURCE,
      confidence: 0,
      details: emptyDetails(),
      error: toErrorInfo(new NoDocumentsIndexed()),
    };
  }

  /** Question against every indexed document. */
  async searchAll(question: string): Promise<SearchResult> {
    await this.opts.index.refresh();
    const records = this.opts.index.records();
    if (records.length === 0) return this.noDocumentsResult();

    const targets: CollectionTarget[] = records.map((r) => ({
      collectionName: r.collectionName,
      documentName: r.name,
    }));
    return aggregateSearch(this.searchDeps(), question, targets, "multi");
  }

  /** Question against the one document `identifier` resolves to. */
  async searchDocument(identifier: string, question: string): Promise<SearchResult> {
    await this.opts.index.refresh();
    const records = this.opts.index.records();
    if (records.length === 0) return this.noDocumentsResult();

    const entries: ResolverEntry[] = records.map((r) => ({
      path: r.sourcePath,
      collectionName: r.collectionName,
    }));

    let collectionName: string;
    try {
      collectionName = resolveCollection(identifier, entries);
    } catch (err) {
      if (!(err instanceof IdentifierNotFound)) throw err;
      return {
        status: "not_indexed",
        answer: `Document '${identifier}' is not indexed. Please index it first.`,
        source: GENERAL_KNOWLEDGE_SOURCE,
        confidence: 0,
        details: emptyDetails(),
        error: toErrorInfo(err),
      };
    }

    const documentName = this.opts.index.nameForCollection(collectionName) ?? identifier;
    return aggregateSearch(
      this.searchDeps(),
      question,
      [{ collectionName, documentName }],
      "single"
    );
  }
}
