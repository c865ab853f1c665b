// src/vectorstore/localStore.ts
// In-process vector store for development and tests.
//
// Distance is lexical: 1 - Jaccard similarity of the lower-cased word sets of
// query and chunk, so 0 is an exact vocabulary match and 1 shares nothing.
// With a file path the collections are persisted as JSON after each mutation.

import { readJsonFile, writeFileAtomic } from "../utils/fs";
import {
  CollectionNotFoundError,
  type CollectionMetadata,
  type VectorMatch,
  type VectorStore,
} from "./types";

interface StoredCollection {
  metadata: CollectionMetadata;
  /** id → text, insertion ordered */
  documents: Map<string, string>;
}

interface PersistedCollection {
  metadata: CollectionMetadata;
  documents: Array<[string, string]>;
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z0-9]+/g) ?? []);
}

export function lexicalDistance(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (ta.size === 0 && tb.size === 0) return 0;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  const union = ta.size + tb.size - shared;
  return 1 - shared / union;
}

function isPersistedCollection(v: unknown): v is PersistedCollection {
  if (typeof v !== "object" || v === null) return false;
  if (!("documents" in v) || !Array.isArray(v.documents)) return false;
  return v.documents.every(
    (pair: unknown) =>
      Array.isArray(pair) &&
      pair.length === 2 &&
      typeof pair[0] === "string" &&
      typeof pair[1] === "string"
  );
}

function metadataOf(v: unknown): CollectionMetadata {
  const out: CollectionMetadata = {};
  if (typeof v === "object" && v !== null && "metadata" in v) {
    const meta = v.metadata;
    if (typeof meta === "object" && meta !== null) {
      for (const [k, val] of Object.entries(meta)) {
        if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
          out[k] = val;
        }
      }
    }
  }
  return out;
}

export class LocalVectorStore implements VectorStore {
  readonly driver = "local";
  private collections = new Map<string, StoredCollection>();
  private loaded: Promise<void> | null = null;

  constructor(private readonly filePath?: string) {}

  private ensureLoaded(): Promise<void> {
    if (!this.loaded) this.loaded = this.load();
    return this.loaded;
  }

  private async load(): Promise<void> {
    if (!this.filePath) return;
    const raw = await readJsonFile(this.filePath);
    if (typeof raw !== "object" || raw === null) return;
    for (const [name, value] of Object.entries(raw)) {
      if (!isPersistedCollection(value)) continue;
      this.collections.set(name, {
        metadata: metadataOf(value),
        documents: new Map(value.documents),
      });
    }
  }

  private async save(): Promise<void> {
    if (!this.filePath) return;
    const body: Record<string, PersistedCollection> = {};
    for (const [name, c] of this.collections) {
      body[name] = { metadata: c.metadata, documents: Array.from(c.documents) };
    }
    await writeFileAtomic(this.filePath, JSON.stringify(body));
  }

  private require(name: string): StoredCollection {
    const c = this.collections.get(name);
    if (!c) throw new CollectionNotFoundError(name);
    return c;
  }

  async createOrGetCollection(name: string, metadata: CollectionMetadata = {}): Promise<void> {
    await this.ensureLoaded();
    if (this.collections.has(name)) return;
    this.collections.set(name, { metadata: { ...metadata }, documents: new Map() });
    await this.save();
  }

  async addDocuments(name: string, texts: string[], ids: string[]): Promise<void> {
    if (texts.length !== ids.length) {
      throw new Error(`addDocuments: ${texts.length} texts but ${ids.length} ids`);
    }
    await this.ensureLoaded();
    const c = this.require(name);
    texts.forEach((text, i) => c.documents.set(ids[i], text));
    await this.save();
  }

  async deleteDocuments(name: string, ids: string[]): Promise<void> {
    await this.ensureLoaded();
    const c = this.require(name);
    for (const id of ids) c.documents.delete(id);
    await this.save();
  }

  async query(name: string, text: string, k: number): Promise<VectorMatch[]> {
    await this.ensureLoaded();
    const c = this.require(name);
    const scored = Array.from(c.documents, ([id, doc]) => ({
      id,
      text: doc,
      distance: lexicalDistance(text, doc),
    }));
    // Array.prototype.sort is stable: equal distances keep insertion order.
    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, Math.max(0, k));
  }

  async deleteCollection(name: string): Promise<void> {
    await this.ensureLoaded();
    if (this.collections.delete(name)) await this.save();
  }

  async listCollections(): Promise<string[]> {
    await this.ensureLoaded();
    return Array.from(this.collections.keys());
  }

  /** Number of chunks held by a collection; undefined when it does not exist. */
  async count(name: string): Promise<number | undefined> {
    await this.ensureLoaded();
    return this.collections.get(name)?.documents.size;
  }
}
