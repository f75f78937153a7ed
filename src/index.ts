export * from './types/index.js';
export * from './errors.js';

export { SemanticSearchService, createSearchService, type SearchServiceComponents } from './SemanticSearchService.js';

export { VectorEncoder, type VectorEncoderOptions } from './embedding/VectorEncoder.js';
export type { EmbeddingProvider, EmbedOptions } from './embedding/types.js';
export { HashEmbeddingProvider, HASH_MODEL_ID, hashEmbedding } from './embedding/providers/HashEmbeddingProvider.js';
export { AiSdkEmbeddingProvider } from './embedding/providers/AiSdkEmbeddingProvider.js';
export { createEmbeddingProvider } from './embedding/factory.js';

export { IndexGateway } from './index/IndexGateway.js';
export type { IndexBackend, BackendQuery, BackendCallOptions } from './index/types.js';
export { InMemoryIndexBackend } from './index/backends/InMemoryIndexBackend.js';
export { HttpIndexBackend } from './index/backends/HttpIndexBackend.js';
export { createIndexBackend } from './index/factory.js';
export { similarity, quantize } from './index/metrics.js';

export { IngestionCoordinator, makeSnippet } from './pipeline/IngestionCoordinator.js';
export { QueryCoordinator } from './pipeline/QueryCoordinator.js';

export { loadDocuments } from './corpus/DirectoryLoader.js';
export { ConfigResolver } from './config/ConfigResolver.js';
export { HttpApiServer } from './server/HttpApiServer.js';
export { UnifiedErrorHandler } from './utils/ErrorHandler.js';
export { PinoLogger } from './utils/PinoLogger.js';
