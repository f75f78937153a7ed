import type {
  CallOptions,
  EmbeddingVector,
  Hit,
  IndexConfig,
  IndexDescription,
  IndexRecord,
  IndexStats,
  Logger,
  MetadataFilter
} from '../types/index.js';
import {
  BackendUnavailableError,
  ConfigMismatchError,
  DimensionMismatchError,
  InvalidInputError,
  TransientBackendError
} from '../errors.js';
import { retry, RetryExhaustedError, withDeadline } from '../utils/async.js';
import type { BackendCallOptions, IndexBackend } from './types.js';

export interface GatewayRetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface IndexGatewayOptions {
  retry?: GatewayRetryOptions;
  logger?: Logger;
}

function compareHits(a: Hit, b: Hit): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * The only component allowed to talk to the index backend. Owns the index
 * configuration, guards vector dimensions and retries transient failures.
 */
export class IndexGateway {
  readonly config: IndexConfig;
  private readonly retryOptions: Required<GatewayRetryOptions>;
  private readonly logger?: Logger;

  constructor(private readonly backend: IndexBackend, config: IndexConfig, opts: IndexGatewayOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.retryOptions = {
      attempts: opts.retry?.attempts ?? 3,
      baseDelayMs: opts.retry?.baseDelayMs ?? 200,
      maxDelayMs: opts.retry?.maxDelayMs ?? 5000
    };
    this.logger = opts.logger;
  }

  /**
   * Create the configured index if it is missing. An existing index with a
   * different dimension or metric is never reused.
   */
  async ensureIndex(options?: CallOptions): Promise<IndexDescription> {
    const { name, dimension, metric, precision } = this.config;
    const existing = await this.call('ensureIndex', options, (o) => this.backend.describeIndex(name, o));

    if (existing) {
      if (existing.dimension !== dimension || existing.metric !== metric) {
        throw new ConfigMismatchError(
          `Index '${name}' exists with dimension ${existing.dimension}/${existing.metric}, ` +
          `configured ${dimension}/${metric}; create a new index instead`,
          { operation: 'ensureIndex', existing: { dimension: existing.dimension, metric: existing.metric } }
        );
      }
      if (existing.precision !== precision) {
        this.logger?.warn(`Index '${name}' uses precision ${existing.precision}, configured ${precision}`);
      }
      this.logger?.debug(`Index '${name}' already exists`, { recordCount: existing.recordCount });
      return existing;
    }

    await this.call('ensureIndex', options, (o) => this.backend.createIndex(this.config, o));
    this.logger?.info(`Created index '${name}'`, { dimension, metric, precision, backend: this.backend.kind });
    return { name, dimension, metric, precision, recordCount: 0 };
  }

  /** Validate every record, then hand the whole call to the backend. */
  async upsert(records: readonly IndexRecord[], options?: CallOptions): Promise<number> {
    records.forEach((record, batchIndex) => {
      if (typeof record.id !== 'string' || record.id.trim().length === 0) {
        throw new InvalidInputError('Record id must be a non-empty string', { operation: 'upsert', batchIndex });
      }
      if (record.vector.length !== this.config.dimension) {
        throw new DimensionMismatchError(this.config.dimension, record.vector.length, {
          operation: 'upsert',
          id: record.id,
          batchIndex
        });
      }
    });
    if (records.length === 0) return 0;

    const batch = [...records];
    await this.call('upsert', options, (o) => this.backend.upsert(this.config.name, batch, o));
    this.logger?.debug(`Upserted ${batch.length} record(s) into '${this.config.name}'`);
    return batch.length;
  }

  async query(
    vector: EmbeddingVector,
    topK: number,
    filters?: MetadataFilter,
    options?: CallOptions
  ): Promise<Hit[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidInputError(`topK must be a positive integer, got ${topK}`, { operation: 'query' });
    }
    if (vector.length !== this.config.dimension) {
      throw new DimensionMismatchError(this.config.dimension, vector.length, { operation: 'query' });
    }

    const hits = await this.call('query', options, (o) =>
      this.backend.query(this.config.name, { vector, topK, filters }, o)
    );
    return [...hits].sort(compareHits).slice(0, topK);
  }

  async stats(options?: CallOptions): Promise<IndexStats> {
    return this.call('stats', options, (o) => this.backend.stats(this.config.name, o));
  }

  private async call<T>(
    operation: string,
    options: CallOptions | undefined,
    fn: (o: BackendCallOptions) => Promise<T>
  ): Promise<T> {
    const deadline = withDeadline(options?.signal, options?.timeoutMs);
    try {
      return await retry(() => fn({ signal: deadline.signal }), {
        ...this.retryOptions,
        signal: deadline.signal,
        shouldRetry: (error) => error instanceof TransientBackendError,
        onRetry: (error, attempt, delayMs) => {
          this.logger?.warn(`Index ${operation} failed, retrying in ${delayMs}ms`, {
            attempt: attempt + 1,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        const last = error.lastError instanceof Error ? error.lastError.message : String(error.lastError);
        throw new BackendUnavailableError(
          `Index service unavailable during ${operation} after ${error.attempts} attempt(s): ${last}`,
          error.attempts,
          { operation, index: this.config.name },
          error.lastError
        );
      }
      throw error;
    } finally {
      deadline.release();
    }
  }
}
