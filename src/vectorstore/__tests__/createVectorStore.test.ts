import { describe, it, expect } from 'vitest';
import { config } from '../../config';
import { OpenAIEmbeddingFunction } from '../../ai/embeddings';
import { createVectorStore } from '../index';

describe('createVectorStore', () => {
  it('uses the local store by default', () => {
    const store = createVectorStore({ ...config, vectorStore: { driver: 'local', chromaUrl: '' } });
    expect(store.driver).toBe('local');
  });

  it('builds a chroma store without contacting the server', () => {
    const store = createVectorStore({
      ...config,
      vectorStore: { driver: 'chroma', chromaUrl: 'http://127.0.0.1:9' },
    });
    expect(store.driver).toBe('chroma');
  });
});

describe('OpenAIEmbeddingFunction', () => {
  it('returns nothing for no input', async () => {
    expect(await new OpenAIEmbeddingFunction({ apiKey: '' }).generate([])).toEqual([]);
  });

  it('requires an API key before calling the endpoint', async () => {
    await expect(new OpenAIEmbeddingFunction({ apiKey: '' }).generate(['policy'])).rejects.toThrow(
      'OPENAI_API_KEY is not set'
    );
  });
});
