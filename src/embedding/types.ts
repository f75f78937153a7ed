import type { EmbeddingVector } from '../types/index.js';

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * A loaded text-to-vector model. Implementations return exactly one vector
 * per input, in input order.
 */
export interface EmbeddingProvider {
  /** Model name and version, e.g. `text-embedding-3-small`. */
  readonly model: string;
  /** Length of every vector the model produces. */
  readonly dimension: number;
  embed(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
}
