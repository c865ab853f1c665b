// Test doubles for the vector store and completion service.
import type { CompletionService } from '../../ai/types';
import {
  CollectionNotFoundError,
  type CollectionMetadata,
  type VectorMatch,
  type VectorStore,
} from '../../vectorstore/types';

/** Returns canned matches per collection regardless of the query text. */
export class CannedVectorStore implements VectorStore {
  readonly driver = 'canned';
  readonly queried: string[] = [];
  private readonly failing = new Set<string>();

  constructor(private readonly matches: Record<string, Array<{ text: string; distance: number | null }>>) {}

  failOn(collection: string): this {
    this.failing.add(collection);
    return this;
  }

  async createOrGetCollection(_name: string, _metadata?: CollectionMetadata): Promise<void> {}
  async addDocuments(): Promise<void> {}
  async deleteDocuments(): Promise<void> {}
  async deleteCollection(): Promise<void> {}

  async listCollections(): Promise<string[]> {
    return Object.keys(this.matches);
  }

  async query(name: string, _text: string, k: number): Promise<VectorMatch[]> {
    this.queried.push(name);
    if (this.failing.has(name)) throw new Error(`connection reset while querying ${name}`);
    const found = this.matches[name];
    if (!found) throw new CollectionNotFoundError(name);
    return found.slice(0, k).map((m, i) => ({ id: `${name}_${i}`, ...m }));
  }
}

/** Records prompts and answers through `reply`. */
export class RecordingCompletion implements CompletionService {
  readonly prompts: string[] = [];

  constructor(private readonly reply: (prompt: string) => string = () => 'stub answer') {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

export class FailingCompletion implements CompletionService {
  calls = 0;

  async complete(): Promise<string> {
    this.calls++;
    throw new Error('model unavailable');
  }
}
