/* src/config.ts
   Centralized config & storage roots */
import path from 'node:path';
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = Number(env(name));
  return env(name) !== '' && Number.isFinite(n) ? Math.floor(n) : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic' | 'ollama';
export type VectorStoreDriver = 'local' | 'chroma';

const AI_PROVIDERS: readonly AIProvider[] = ['dev', 'openai', 'anthropic', 'ollama'];

function parseProvider(raw: string): AIProvider {
  const found = AI_PROVIDERS.find((p) => p === raw.trim().toLowerCase());
  return found ?? 'dev';
}

function parseVectorStore(raw: string): VectorStoreDriver {
  return raw.trim().toLowerCase() === 'chroma' ? 'chroma' : 'local';
}

const storageRoot = path.resolve(process.cwd(), env('STORAGE_ROOT', 'storage'));

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.pdf',
  '.docx',
  '.xlsx',
  '.csv',
  '.txt',
  '.md',
  '.json',
  '.zip',
];

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── Storage ──────────────────────────────────────────────────────
  storage: {
    root: storageRoot,
    documents: path.resolve(process.cwd(), env('DOCUMENTS_DIR', 'documents')),
    indexFile: path.join(storageRoot, 'knowledge_base_index.json'),
    vectors: path.join(storageRoot, 'vectors.json'),
    evaluations: path.join(storageRoot, 'evaluations'),
  },

  // ── Knowledge base ───────────────────────────────────────────────
  knowledgeBase: {
    supportedExtensions: SUPPORTED_EXTENSIONS,
    topK: envInt('KB_TOP_K', 3),
    chunkSize: envInt('KB_CHUNK_SIZE', 1000),
    chunkOverlap: envInt('KB_CHUNK_OVERLAP', 200),
    autoIndexIntervalMs: envInt('AUTO_INDEX_INTERVAL_MS', 60_000),
  },

  // ── Vector store ─────────────────────────────────────────────────
  vectorStore: {
    driver: parseVectorStore(env('VECTOR_STORE', 'local')),
    chromaUrl: env('CHROMA_URL', 'http://localhost:8000'),
  },

  // ── Eligibility cache ────────────────────────────────────────────
  eligibility: {
    cacheMaxEntries: envInt('ELIGIBILITY_CACHE_MAX', 1000),
    cacheTtlMs: envInt('ELIGIBILITY_CACHE_TTL_MS', 0),
  },

  // ── Temporary file cleanup ───────────────────────────────────────
  cleanup: {
    maxAttempts: envInt('TEMP_DELETE_MAX_ATTEMPTS', 20),
    delayMs: envInt('TEMP_DELETE_DELAY_MS', 250),
  },

  // ── HTTP ─────────────────────────────────────────────────────────
  server: {
    port: envInt('PORT', 4000),
    corsOrigins: env('CORS_ORIGINS', 'http://localhost:5173')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── AI ───────────────────────────────────────────────────────────
  ai: {
    provider: parseProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    ollamaUrl: env('OLLAMA_BASE_URL', 'http://localhost:11434'),
    embeddingModel: env('EMBEDDING_MODEL', 'text-embedding-3-small'),
    maxTokens: envInt('AI_MAX_TOKENS', 600),
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-3-5-haiku-latest'),
      ollama: env('AI_MODEL_OLLAMA', 'llama3'),
    },
  },
} as const;

export type AppConfig = typeof config;
