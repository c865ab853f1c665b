// src/vectorstore/chromaStore.ts
// Vector store backed by a Chroma server through the `chromadb` client.
import { ChromaClient, type IEmbeddingFunction } from "chromadb";
import { createLogger } from "../observability/logger";
import {
  CollectionNotFoundError,
  type CollectionMetadata,
  type VectorMatch,
  type VectorStore,
} from "./types";

const log = createLogger("vectorstore/chroma");

export interface ChromaStoreOptions {
  url: string;
  embeddingFunction: IEmbeddingFunction;
}

/** listCollections returns names or collection objects depending on client release. */
function collectionNameOf(entry: unknown): string | null {
  if (typeof entry === "string") return entry;
  if (typeof entry === "object" && entry !== null && "name" in entry) {
    return typeof entry.name === "string" ? entry.name : null;
  }
  return null;
}

export class ChromaVectorStore implements VectorStore {
  readonly driver = "chroma";
  private readonly client: ChromaClient;
  private readonly embeddingFunction: IEmbeddingFunction;

  constructor(opts: ChromaStoreOptions) {
    this.client = new ChromaClient({ path: opts.url });
    this.embeddingFunction = opts.embeddingFunction;
  }

  private async collection(name: string) {
    const names = await this.listCollections();
    if (!names.includes(name)) throw new CollectionNotFoundError(name);
    return this.client.getCollection({ name, embeddingFunction: this.embeddingFunction });
  }

  async createOrGetCollection(name: string, metadata?: CollectionMetadata): Promise<void> {
    await this.client.getOrCreateCollection({
      name,
      metadata,
      embeddingFunction: this.embeddingFunction,
    });
  }

  async addDocuments(name: string, texts: string[], ids: string[]): Promise<void> {
    if (texts.length === 0) return;
    const c = await this.collection(name);
    await c.upsert({ ids, documents: texts });
  }

  async deleteDocuments(name: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const c = await this.collection(name);
    await c.delete({ ids });
  }

  async query(name: string, text: string, k: number): Promise<VectorMatch[]> {
    const c = await this.collection(name);
    const res = await c.query({ queryTexts: [text], nResults: k });

    const ids = res.ids?.[0] ?? [];
    const docs = res.documents?.[0] ?? [];
    const distances = res.distances?.[0] ?? [];

    const matches: VectorMatch[] = [];
    ids.forEach((id, i) => {
      const doc = docs[i];
      if (typeof doc !== "string") return;
      const distance = distances[i];
      matches.push({
        id,
        text: doc,
        distance: typeof distance === "number" && Number.isFinite(distance) ? distance : null,
      });
    });
    return matches;
  }

  async deleteCollection(name: string): Promise<void> {
    const names = await this.listCollections();
    if (!names.includes(name)) {
      log.debug({ collection: name }, "Collection already absent");
      return;
    }
    await this.client.deleteCollection({ name });
  }

  async listCollections(): Promise<string[]> {
    const listed: unknown = await this.client.listCollections();
    if (!Array.isArray(listed)) return [];
    const names: string[] = [];
    for (const entry of listed) {
      const n = collectionNameOf(entry);
      if (n) names.push(n);
    }
    return names;
  }
}
