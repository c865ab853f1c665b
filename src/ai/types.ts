// src/ai/types.ts
import type { AIProvider } from '../config';

export type ProviderId = AIProvider;

export interface ModelInvocationOptions {
  /** Which provider to route to; defaults to AI_PROVIDER. */
  provider?: ProviderId;
  /** Response length cap in tokens. */
  maxTokens?: number;
}

/** Prompt in, answer text out. One request per call, no conversation state. */
export interface CompletionService {
  complete(prompt: string): Promise<string>;
}
