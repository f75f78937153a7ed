import { embedMany } from 'ai';
import type { EmbeddingModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { EmbeddingVector } from '../../types/index.js';
import type { EmbeddingProvider, EmbedOptions } from '../types.js';

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434/v1';

export interface AiSdkEmbeddingProviderOptions {
  /** `openai` talks to the OpenAI API; `ollama` to an Ollama server's OpenAI-compatible endpoint. */
  provider: 'openai' | 'ollama';
  model: string;
  dimension: number;
  apiKey?: string;
  baseUrl?: string;
}

type ProviderOptions = Parameters<typeof embedMany>[0]['providerOptions'];

/**
 * Embeddings through the AI SDK, with SDK-level retries off.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  private readonly embeddingModel: EmbeddingModel<string>;
  private readonly providerOptions: ProviderOptions;

  constructor(opts: AiSdkEmbeddingProviderOptions) {
    this.model = opts.model;
    this.dimension = opts.dimension;

    const client = opts.provider === 'ollama'
      ? createOpenAI({ baseURL: opts.baseUrl ?? OLLAMA_DEFAULT_BASE_URL, apiKey: opts.apiKey ?? 'ollama' })
      : createOpenAI({ baseURL: opts.baseUrl, apiKey: opts.apiKey });
    this.embeddingModel = client.textEmbeddingModel(opts.model);

    // Only the text-embedding-3 family can shorten its output on request.
    this.providerOptions = opts.provider === 'openai' && opts.model.startsWith('text-embedding-3')
      ? { openai: { dimensions: opts.dimension } }
      : undefined;
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({
      model: this.embeddingModel,
      values: texts,
      maxRetries: 0,
      abortSignal: options?.signal,
      providerOptions: this.providerOptions
    });
    return embeddings;
  }
}
