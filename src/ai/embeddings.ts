// src/ai/embeddings.ts
// Embedding function handed to the Chroma client; embeddings are computed by
// the OpenAI embeddings endpoint, never in-process.
import OpenAI from 'openai';
import type { IEmbeddingFunction } from 'chromadb';
import { config } from '../config';

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  model?: string;
}

export class OpenAIEmbeddingFunction implements IEmbeddingFunction {
  private client: OpenAI | null = null;
  private readonly apiKey: string;
  readonly model: string;

  constructor(opts: OpenAIEmbedderOptions = {}) {
    this.apiKey = opts.apiKey ?? config.ai.openaiKey;
    this.model = opts.model ?? config.ai.embeddingModel;
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.apiKey) {
      throw new Error(
        'OPENAI_API_KEY is not set. Set it in your environment to use the chroma vector store.'
      );
    }
    this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async generate(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const resp = await this.getClient().embeddings.create({
      model: this.model,
      input: texts,
    });
    // The endpoint may reorder; `index` ties each vector to its input.
    return [...resp.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }
}
