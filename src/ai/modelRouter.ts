/* src/ai/modelRouter.ts
   Provider-agnostic text completion. Provider SDKs are loaded on first use
   so the dev stub runs without credentials. */
import { config } from '../config';
import { recordAiRequest } from '../observability/metrics';
import { createLogger } from '../observability/logger';
import type { CompletionService, ModelInvocationOptions, ProviderId } from './types';

const log = createLogger('ai/modelRouter');

export type ComposeOptions = ModelInvocationOptions;

export interface ComposeResult {
  text: string;
  provider: ProviderId;
  model: string;
}

const DEFAULT_MAX_TOKENS = 600;

/* ------------------------------ providers ------------------------------ */

async function composeDev(prompt: string): Promise<ComposeResult> {
  const model = 'dev-stub-1';
  const text = `Draft:\n${prompt}\n\n[dev stub; deterministic]`;
  return { text, provider: 'dev', model };
}

async function composeOpenAI(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const { default: OpenAI } = await import('openai');
  const client = new OpenAI({ apiKey: config.ai.openaiKey });
  const model = config.ai.model.openai;

  const resp = await client.chat.completions.create({
    model,
    messages: [{ role: 'user', content: prompt }],
    max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
  });

  const text = (resp.choices[0]?.message?.content ?? '').trim();
  return { text, provider: 'openai', model };
}

async function composeAnthropic(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const { default: Anthropic } = await import('@anthropic-ai/sdk');
  const client = new Anthropic({ apiKey: config.ai.anthropicKey });
  const model = config.ai.model.anthropic;

  const resp = await client.messages.create({
    model,
    max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
    messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
  });

  // Visible text blocks only.
  const text = resp.content
    .flatMap((block) => (block.type === 'text' ? [block.text.trim()] : []))
    .filter(Boolean)
    .join('\n\n')
    .trim();
  return { text, provider: 'anthropic', model };
}

async function composeOllama(prompt: string, opts: ComposeOptions): Promise<ComposeResult> {
  const { Ollama } = await import('ollama');
  const client = new Ollama({ host: config.ai.ollamaUrl });
  const model = config.ai.model.ollama;

  const resp = await client.chat({
    model,
    messages: [{ role: 'user', content: prompt }],
    options: { temperature: 0.2, num_predict: opts.maxTokens ?? DEFAULT_MAX_TOKENS },
  });
  return { text: resp.message.content.trim(), provider: 'ollama', model };
}

const PROVIDERS: Record<
  ProviderId,
  (prompt: string, opts: ComposeOptions) => Promise<ComposeResult>
> = {
  dev: composeDev,
  openai: composeOpenAI,
  anthropic: composeAnthropic,
  ollama: composeOllama,
};

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical completion entry. Routes to opts.provider, else the configured
 * provider. Every call is timed into the AI metrics.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderId = opts.provider ?? config.ai.provider;
  const started = Date.now();

  try {
    const result = await PROVIDERS[provider](prompt, opts);
    recordAiRequest(provider, 'success', Date.now() - started);
    return result;
  } catch (err) {
    recordAiRequest(provider, 'error', Date.now() - started);
    log.error({ err, provider }, 'Completion request failed');
    throw err;
  }
}

/* ------------------------------ service ------------------------------ */

/** CompletionService bound to one provider and token cap. */
export class RoutedCompletionService implements CompletionService {
  constructor(private readonly opts: ComposeOptions = {}) {}

  async complete(prompt: string): Promise<string> {
    const result = await composeText(prompt, this.opts);
    return result.text;
  }
}
