/* src/services.ts
   Composition root: builds the knowledge base and its collaborators from config. */
import { config, type AppConfig } from './config';
import { RoutedCompletionService } from './ai/modelRouter';
import type { CompletionService } from './ai/types';
import { EvaluationStore } from './evaluation/harness';
import { FileTextExtractor, type TextExtractor } from './extraction/textExtractor';
import { BackgroundIndexer } from './jobs/backgroundIndexer';
import { DocumentIndexStore } from './knowledge/documentIndex';
import { EligibilityCache, EligibilityChecker } from './knowledge/eligibility';
import { KnowledgeBaseManager } from './knowledge/knowledgeBase';
import type { HealthDeps } from './observability/healthCheck';
import { createVectorStore } from './vectorstore';
import type { VectorStore } from './vectorstore/types';

export interface AppServices {
  kb: KnowledgeBaseManager;
  eligibility: EligibilityChecker;
  evaluations: EvaluationStore;
  health: HealthDeps;
  indexer: BackgroundIndexer;
}

export interface ServiceOverrides {
  vectorStore?: VectorStore;
  completion?: CompletionService;
  extractor?: TextExtractor;
  clock?: () => Date;
}

/** Call `kb.init()` before serving. */
export function createServices(cfg: AppConfig = config, overrides: ServiceOverrides = {}): AppServices {
  const vectorStore = overrides.vectorStore ?? createVectorStore(cfg);
  const extractor = overrides.extractor ?? new FileTextExtractor();

  const kb = new KnowledgeBaseManager({
    documentsDir: cfg.storage.documents,
    index: new DocumentIndexStore(cfg.storage.indexFile),
    vectorStore,
    extractor,
    completion:
      overrides.completion ??
      new RoutedCompletionService({ provider: cfg.ai.provider, maxTokens: cfg.ai.maxTokens }),
    supportedExtensions: cfg.knowledgeBase.supportedExtensions,
    topK: cfg.knowledgeBase.topK,
    chunkSize: cfg.knowledgeBase.chunkSize,
    chunkOverlap: cfg.knowledgeBase.chunkOverlap,
    clock: overrides.clock,
  });

  const eligibility = new EligibilityChecker({
    search: kb,
    cache: new EligibilityCache({
      maxEntries: cfg.eligibility.cacheMaxEntries,
      ttlMs: cfg.eligibility.cacheTtlMs,
    }),
    extractor,
    cleanup: cfg.cleanup,
  });

  return {
    kb,
    eligibility,
    evaluations: new EvaluationStore(cfg.storage.evaluations, overrides.clock),
    health: { storageRoot: cfg.storage.root, vectorStore },
    indexer: new BackgroundIndexer(kb, cfg.knowledgeBase.autoIndexIntervalMs),
  };
}
