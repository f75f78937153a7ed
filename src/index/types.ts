import type {
  EmbeddingVector,
  Hit,
  IndexConfig,
  IndexDescription,
  IndexRecord,
  IndexStats,
  MetadataFilter
} from '../types/index.js';

export interface BackendCallOptions {
  signal?: AbortSignal;
}

export interface BackendQuery {
  vector: EmbeddingVector;
  topK: number;
  filters?: MetadataFilter;
}

/**
 * Contract of the external ANN index service. Upserts commit per call;
 * retryable failures are raised as TransientBackendError.
 */
export interface IndexBackend {
  readonly kind: string;
  /** Resolves to null when no index of that name exists. */
  describeIndex(name: string, options?: BackendCallOptions): Promise<IndexDescription | null>;
  createIndex(config: IndexConfig, options?: BackendCallOptions): Promise<void>;
  upsert(name: string, records: IndexRecord[], options?: BackendCallOptions): Promise<void>;
  query(name: string, query: BackendQuery, options?: BackendCallOptions): Promise<Hit[]>;
  stats(name: string, options?: BackendCallOptions): Promise<IndexStats>;
}
