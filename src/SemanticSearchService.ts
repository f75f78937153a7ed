import type {
  AppConfig,
  CallOptions,
  Document,
  HealthReport,
  Hit,
  IngestionResult,
  Logger,
  MetadataFilter
} from './types/index.js';
import { ConfigMismatchError } from './errors.js';
import type { EmbeddingProvider } from './embedding/types.js';
import { createEmbeddingProvider } from './embedding/factory.js';
import { VectorEncoder } from './embedding/VectorEncoder.js';
import type { IndexBackend } from './index/types.js';
import { createIndexBackend } from './index/factory.js';
import { IndexGateway } from './index/IndexGateway.js';
import { IngestionCoordinator } from './pipeline/IngestionCoordinator.js';
import { QueryCoordinator } from './pipeline/QueryCoordinator.js';
import { PinoLogger } from './utils/PinoLogger.js';

export interface SearchServiceComponents {
  logger?: Logger;
  /** Replaces the provider configured under `embedding`. */
  embeddingProvider?: EmbeddingProvider;
  /** Replaces the backend configured under `backend`. */
  indexBackend?: IndexBackend;
}

export class SemanticSearchService {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly encoder: VectorEncoder;
  readonly gateway: IndexGateway;
  private readonly ingestion: IngestionCoordinator;
  private readonly queries: QueryCoordinator;
  private startPromise?: Promise<void>;

  constructor(config: AppConfig, components: SearchServiceComponents = {}) {
    this.config = config;
    this.logger = components.logger ?? new PinoLogger({ level: config.logLevel, pretty: config.logPretty });

    const provider = components.embeddingProvider ?? createEmbeddingProvider(config.embedding, { logger: this.logger });
    const backend = components.indexBackend ?? createIndexBackend(config.backend, { logger: this.logger });

    this.encoder = new VectorEncoder(provider, {
      dimension: config.embedding.dimension,
      batchSize: config.embedding.batchSize,
      logger: this.logger
    });
    this.gateway = new IndexGateway(backend, config.index, { retry: config.backend.retry, logger: this.logger });
    this.ingestion = new IngestionCoordinator(this.encoder, this.gateway, {
      snippetLength: config.ingestion.snippetLength,
      logger: this.logger
    });
    this.queries = new QueryCoordinator(this.encoder, this.gateway, this.logger);
  }

  /** Check dimensions agree, make sure the index exists and load the model. */
  start(options?: CallOptions): Promise<void> {
    if (!this.startPromise) {
      this.startPromise = this.doStart(options).catch((error: unknown) => {
        this.startPromise = undefined;
        throw error;
      });
    }
    return this.startPromise;
  }

  async ingest(documents: readonly Document[], options?: CallOptions): Promise<IngestionResult> {
    return this.ingestion.ingest(documents, options);
  }

  async search(
    queryText: string,
    topK: number = this.config.search.defaultTopK,
    filters?: MetadataFilter,
    options?: CallOptions
  ): Promise<Hit[]> {
    return this.queries.search({ queryText, topK, filters }, options);
  }

  async health(options?: CallOptions): Promise<HealthReport> {
    const base = {
      index: this.config.index.name,
      metric: this.config.index.metric,
      dimension: this.config.index.dimension,
      embeddingModel: this.encoder.model
    };
    try {
      const stats = await this.gateway.stats(options);
      return { ...base, indexReachable: true, recordCount: stats.recordCount };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Index health check failed', { error: message });
      return { ...base, indexReachable: false, recordCount: 0, error: message };
    }
  }

  private async doStart(options?: CallOptions): Promise<void> {
    const { embedding, index } = this.config;
    if (embedding.dimension !== index.dimension) {
      throw new ConfigMismatchError(
        `Embedding dimension ${embedding.dimension} does not match index dimension ${index.dimension}`,
        { operation: 'start' }
      );
    }

    this.logger.info('Starting semantic search service', {
      index: index.name,
      metric: index.metric,
      precision: index.precision,
      backend: this.config.backend.provider,
      embedding: { provider: embedding.provider, model: this.encoder.model }
    });

    await this.gateway.ensureIndex(options);
    await this.encoder.warmup(options);
  }
}

export function createSearchService(config: AppConfig, components?: SearchServiceComponents): SemanticSearchService {
  return new SemanticSearchService(config, components);
}
