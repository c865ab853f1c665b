// src/vectorstore/index.ts
// Vector store selection from configuration.
import { config } from "../config";
import { OpenAIEmbeddingFunction } from "../ai/embeddings";
import { createLogger } from "../observability/logger";
import { ChromaVectorStore } from "./chromaStore";
import { LocalVectorStore } from "./localStore";
import type { VectorStore } from "./types";

export * from "./types";
export { LocalVectorStore, lexicalDistance } from "./localStore";
export { ChromaVectorStore } from "./chromaStore";

const log = createLogger("vectorstore");

export function createVectorStore(cfg = config): VectorStore {
  if (cfg.vectorStore.driver === "chroma") {
    log.info({ url: cfg.vectorStore.chromaUrl }, "Using chroma vector store");
    return new ChromaVectorStore({
      url: cfg.vectorStore.chromaUrl,
      embeddingFunction: new OpenAIEmbeddingFunction({
        apiKey: cfg.ai.openaiKey,
        model: cfg.ai.embeddingModel,
      }),
    });
  }
  log.info({ file: cfg.storage.vectors }, "Using local vector store");
  return new LocalVectorStore(cfg.storage.vectors);
}
