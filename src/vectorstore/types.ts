// src/vectorstore/types.ts
// Port for the vector-similarity primitive. One collection per document;
// distances are non-negative and lower means closer.

export type CollectionMetadata = Record<string, string | number | boolean>;

export interface VectorMatch {
  id: string;
  text: string;
  /** null when the backend returned no distance for this match */
  distance: number | null;
}

export interface VectorStore {
  readonly driver: string;

  createOrGetCollection(name: string, metadata?: CollectionMetadata): Promise<void>;

  /** Upsert: an existing id is overwritten. */
  addDocuments(name: string, texts: string[], ids: string[]): Promise<void>;

  deleteDocuments(name: string, ids: string[]): Promise<void>;

  /** Throws when the collection does not exist. */
  query(name: string, text: string, k: number): Promise<VectorMatch[]>;

  /** Deleting a missing collection is a no-op. */
  deleteCollection(name: string): Promise<void>;

  listCollections(): Promise<string[]>;
}

export class CollectionNotFoundError extends Error {
  constructor(public readonly collection: string) {
    super(`Collection ${collection} does not exist`);
    this.name = "CollectionNotFoundError";
  }
}
