import type { EmbeddingConfig, Logger } from '../types/index.js';
import { ConfigMismatchError } from '../errors.js';
import type { EmbeddingProvider } from './types.js';
import { HASH_MODEL_ID, HashEmbeddingProvider } from './providers/HashEmbeddingProvider.js';
import { AiSdkEmbeddingProvider } from './providers/AiSdkEmbeddingProvider.js';

export function createEmbeddingProvider(config: EmbeddingConfig, opts?: { logger?: Logger }): EmbeddingProvider {
  switch (config.provider) {
    case 'hash':
      if (config.model !== HASH_MODEL_ID) {
        opts?.logger?.warn(`embedding.model='${config.model}' is ignored by the hash provider; using ${HASH_MODEL_ID}`);
      }
      return new HashEmbeddingProvider({ dimension: config.dimension });

    case 'openai':
      if (!config.apiKey && !config.baseUrl) {
        throw new ConfigMismatchError('embedding.provider=openai requires embedding.apiKey (EMBEDDING_API_KEY)', {
          operation: 'createEmbeddingProvider'
        });
      }
      return new AiSdkEmbeddingProvider({
        provider: 'openai',
        model: config.model,
        dimension: config.dimension,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl
      });

    case 'ollama':
      return new AiSdkEmbeddingProvider({
        provider: 'ollama',
        model: config.model,
        dimension: config.dimension,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl
      });
  }
}
