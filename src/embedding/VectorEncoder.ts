import type { CallOptions, EmbeddingVector, Logger } from '../types/index.js';
import {
  CancelledError,
  DimensionMismatchError,
  EncodingError,
  InvalidInputError,
  SearchError
} from '../errors.js';
import { throwIfAborted, withDeadline } from '../utils/async.js';
import type { EmbeddingProvider } from './types.js';

export interface VectorEncoderOptions {
  /** Dimension every vector must have; defaults to the provider's. */
  dimension?: number;
  /** Texts sent to the provider per call (default: 32). */
  batchSize?: number;
  logger?: Logger;
}

const WARMUP_TEXT = 'warmup';

/**
 * Converts text into vectors of a fixed dimension.
 *
 * Blank text is refused. A batch either yields one vector per input, in
 * order, or fails as a whole.
 */
export class VectorEncoder {
  readonly dimension: number;
  private readonly batchSize: number;
  private readonly logger?: Logger;

  constructor(private readonly provider: EmbeddingProvider, opts: VectorEncoderOptions = {}) {
    this.dimension = opts.dimension ?? provider.dimension;
    this.batchSize = Math.max(1, Math.floor(opts.batchSize ?? 32));
    this.logger = opts.logger;
  }

  get model(): string {
    return this.provider.model;
  }

  async encode(text: string, options?: CallOptions): Promise<EmbeddingVector> {
    const [vector] = await this.run([text], 'encode', options);
    if (!vector) {
      throw new EncodingError('Embedding backend returned no vector', { operation: 'encode' });
    }
    return vector;
  }

  async encodeBatch(texts: readonly string[], options?: CallOptions): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];
    return this.run(texts, 'encodeBatch', options);
  }

  /** Load the model by encoding a short sample text once. */
  async warmup(options?: CallOptions): Promise<void> {
    const started = Date.now();
    await this.encode(WARMUP_TEXT, options);
    this.logger?.debug('Embedding model warmed up', { model: this.model, ms: Date.now() - started });
  }

  private async run(texts: readonly string[], operation: string, options?: CallOptions): Promise<EmbeddingVector[]> {
    texts.forEach((text, batchIndex) => {
      if (typeof text !== 'string' || text.trim().length === 0) {
        throw new InvalidInputError('Text must be a non-empty, non-whitespace string', { operation, batchIndex });
      }
    });

    const deadline = withDeadline(options?.signal, options?.timeoutMs);
    try {
      const out: EmbeddingVector[] = [];
      for (let start = 0; start < texts.length; start += this.batchSize) {
        throwIfAborted(deadline.signal, operation);
        const chunk = texts.slice(start, start + this.batchSize);
        const vectors = await this.callProvider(chunk, start, operation, deadline.signal);
        out.push(...vectors);
      }
      return out;
    } finally {
      deadline.release();
    }
  }

  private async callProvider(
    chunk: string[],
    offset: number,
    operation: string,
    signal: AbortSignal | undefined
  ): Promise<EmbeddingVector[]> {
    let vectors: EmbeddingVector[];
    try {
      vectors = await this.provider.embed(chunk, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Operation ${operation} was cancelled`, { operation }, error);
      }
      if (error instanceof SearchError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new EncodingError(`Embedding backend failed: ${message}`, { operation, batchIndex: offset, model: this.model }, error);
    }

    if (vectors.length !== chunk.length) {
      throw new EncodingError(
        `Embedding backend returned ${vectors.length} vectors for ${chunk.length} texts`,
        { operation, batchIndex: offset, model: this.model }
      );
    }

    vectors.forEach((vector, i) => {
      const batchIndex = offset + i;
      if (vector.length !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, vector.length, { operation, batchIndex });
      }
      if (!vector.every(Number.isFinite)) {
        throw new EncodingError('Embedding backend returned a non-finite component', { operation, batchIndex });
      }
    });

    return vectors;
  }
}
