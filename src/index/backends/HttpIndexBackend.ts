import { z } from 'zod';
import type {
  Hit,
  IndexConfig,
  IndexDescription,
  IndexRecord,
  IndexStats,
  Logger,
  MetadataFilter,
  SimilarityMetric
} from '../../types/index.js';
import { MetaScalarSchema } from '../../types/index.js';
import {
  BackendAuthError,
  BackendRequestError,
  CancelledError,
  TransientBackendError
} from '../../errors.js';
import { withDeadline } from '../../utils/async.js';
import type { BackendCallOptions, BackendQuery, IndexBackend } from '../types.js';

export interface HttpIndexBackendOptions {
  baseUrl: string;
  authToken?: string;
  /** Per-request timeout; expiry counts as a transient failure. */
  timeoutMs?: number;
  logger?: Logger;
}

const SPACE_TYPES: Record<SimilarityMetric, string> = {
  cosine: 'cosine',
  dot: 'ip',
  euclidean: 'l2'
};

const METRICS_BY_SPACE_TYPE: Record<string, SimilarityMetric | undefined> = {
  cosine: 'cosine',
  ip: 'dot',
  l2: 'euclidean'
};

const IndexInfoSchema = z.object({
  name: z.string().optional(),
  dimension: z.number().int().positive(),
  space_type: z.string(),
  precision: z.string().default('float32'),
  total_elements: z.number().int().min(0).default(0)
});

const SearchResultSchema = z.array(
  z.object({
    id: z.string(),
    similarity: z.number(),
    meta: z.record(z.string(), MetaScalarSchema).nullish().transform((meta) => meta ?? {})
  })
);

/** `{ a: 1 }` becomes `[{ a: { $eq: 1 } }]`. */
export function toFilterClauses(filters: MetadataFilter): Array<Record<string, { $eq: unknown }>> {
  return Object.entries(filters).map(([key, value]) => ({ [key]: { $eq: value } }));
}

/**
 * JSON-over-HTTP client for a remote vector database. Failures are raised as
 * transient, auth or rejected-request errors.
 */
export class HttpIndexBackend implements IndexBackend {
  readonly kind = 'http';
  private readonly baseUrl: string;
  private readonly authToken?: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(opts: HttpIndexBackendOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.authToken = opts.authToken || undefined;
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.logger = opts.logger;
  }

  async describeIndex(name: string, options?: BackendCallOptions): Promise<IndexDescription | null> {
    const response = await this.send('GET', `/index/${encodeURIComponent(name)}/info`, 'describeIndex', undefined, options, [404]);
    if (response.status === 404) return null;
    return this.toDescription(name, await this.readJson(response, 'describeIndex'));
  }

  async createIndex(config: IndexConfig, options?: BackendCallOptions): Promise<void> {
    await this.send('POST', '/index/create', 'createIndex', {
      index_name: config.name,
      dim: config.dimension,
      space_type: SPACE_TYPES[config.metric],
      precision: config.precision
    }, options);
  }

  async upsert(name: string, records: IndexRecord[], options?: BackendCallOptions): Promise<void> {
    const body = records.map((r) => ({ id: r.id, vector: r.vector, meta: r.meta }));
    await this.send('POST', `/index/${encodeURIComponent(name)}/vector/insert`, 'upsert', body, options);
  }

  async query(name: string, query: BackendQuery, options?: BackendCallOptions): Promise<Hit[]> {
    const body: Record<string, unknown> = { vector: query.vector, k: query.topK };
    if (query.filters && Object.keys(query.filters).length > 0) {
      body.filter = toFilterClauses(query.filters);
    }
    const response = await this.send('POST', `/index/${encodeURIComponent(name)}/search`, 'query', body, options);
    const parsed = SearchResultSchema.safeParse(await this.readJson(response, 'query'));
    if (!parsed.success) {
      throw new BackendRequestError(`Unexpected search response: ${parsed.error.message}`, response.status, { operation: 'query' });
    }
    return parsed.data;
  }

  async stats(name: string, options?: BackendCallOptions): Promise<IndexStats> {
    const description = await this.describeIndex(name, options);
    if (!description) {
      throw new BackendRequestError(`Index '${name}' does not exist`, 404, { operation: 'stats' });
    }
    return { recordCount: description.recordCount, dimension: description.dimension, metric: description.metric };
  }

  private toDescription(name: string, raw: unknown): IndexDescription {
    const parsed = IndexInfoSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BackendRequestError(`Unexpected index info: ${parsed.error.message}`, 200, { operation: 'describeIndex' });
    }
    const metric = METRICS_BY_SPACE_TYPE[parsed.data.space_type];
    if (!metric) {
      throw new BackendRequestError(`Unknown space type '${parsed.data.space_type}'`, 200, { operation: 'describeIndex' });
    }
    return {
      name: parsed.data.name ?? name,
      dimension: parsed.data.dimension,
      metric,
      precision: parsed.data.precision,
      recordCount: parsed.data.total_elements
    };
  }

  private async readJson(response: Response, operation: string): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      throw new BackendRequestError('Response body is not valid JSON', response.status, { operation });
    }
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    operation: string,
    body: unknown,
    options?: BackendCallOptions,
    allowStatus: number[] = []
  ): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.authToken) headers.Authorization = `Bearer ${this.authToken}`;

    const deadline = withDeadline(options?.signal, this.timeoutMs);
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: deadline.signal
      });
    } catch (error) {
      if (options?.signal?.aborted) {
        throw new CancelledError(`Operation ${operation} was cancelled`, { operation }, error);
      }
      const reason = deadline.signal?.aborted ? `timed out after ${this.timeoutMs}ms` : (error instanceof Error ? error.message : String(error));
      throw new TransientBackendError(`Index service request failed: ${reason}`, undefined, { operation }, error);
    } finally {
      deadline.release();
    }

    if (response.ok || allowStatus.includes(response.status)) {
      return response;
    }

    const detail = await response.text().catch(() => '');
    const message = `Index service responded ${response.status} to ${operation}${detail ? `: ${detail.slice(0, 200)}` : ''}`;
    this.logger?.debug('Index service error response', { operation, status: response.status });

    if (response.status === 401 || response.status === 403) {
      throw new BackendAuthError(message, response.status, { operation });
    }
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
      throw new TransientBackendError(message, response.status, { operation });
    }
    throw new BackendRequestError(message, response.status, { operation });
  }
}
