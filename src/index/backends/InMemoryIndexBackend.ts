import type {
  Hit,
  IndexConfig,
  IndexDescription,
  IndexRecord,
  IndexStats,
  Metadata,
  MetadataFilter
} from '../../types/index.js';
import { BackendRequestError, ConfigMismatchError, DimensionMismatchError } from '../../errors.js';
import { throwIfAborted } from '../../utils/async.js';
import { quantize, similarity } from '../metrics.js';
import type { BackendCallOptions, BackendQuery, IndexBackend } from '../types.js';

interface InMemoryIndex {
  config: IndexConfig;
  records: Map<string, IndexRecord>;
}

function matchesFilters(meta: Metadata, filters: MetadataFilter | undefined): boolean {
  if (!filters) return true;
  return Object.entries(filters).every(([key, expected]) => key in meta && meta[key] === expected);
}

/**
 * Exact-scan index kept in process memory. Suited to tests and small
 * single-process deployments; upserts are atomic per call.
 */
export class InMemoryIndexBackend implements IndexBackend {
  readonly kind = 'memory';
  private readonly indexes = new Map<string, InMemoryIndex>();

  async describeIndex(name: string, options?: BackendCallOptions): Promise<IndexDescription | null> {
    throwIfAborted(options?.signal, 'describeIndex');
    const index = this.indexes.get(name);
    if (!index) return null;
    return { ...index.config, recordCount: index.records.size };
  }

  async createIndex(config: IndexConfig, options?: BackendCallOptions): Promise<void> {
    throwIfAborted(options?.signal, 'createIndex');
    if (this.indexes.has(config.name)) {
      throw new ConfigMismatchError(`Index '${config.name}' already exists`, { operation: 'createIndex' });
    }
    this.indexes.set(config.name, { config: { ...config }, records: new Map() });
  }

  async upsert(name: string, records: IndexRecord[], options?: BackendCallOptions): Promise<void> {
    throwIfAborted(options?.signal, 'upsert');
    const index = this.require(name, 'upsert');
    const { dimension, precision } = index.config;

    records.forEach((record, batchIndex) => {
      if (record.vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, record.vector.length, { operation: 'upsert', id: record.id, batchIndex });
      }
    });

    for (const record of records) {
      index.records.set(record.id, {
        id: record.id,
        vector: quantize(record.vector, precision),
        meta: { ...record.meta }
      });
    }
  }

  async query(name: string, query: BackendQuery, options?: BackendCallOptions): Promise<Hit[]> {
    throwIfAborted(options?.signal, 'query');
    const index = this.require(name, 'query');
    const { dimension, metric } = index.config;
    if (query.vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, query.vector.length, { operation: 'query' });
    }

    const hits: Hit[] = [];
    for (const record of index.records.values()) {
      if (!matchesFilters(record.meta, query.filters)) continue;
      hits.push({ id: record.id, similarity: similarity(metric, query.vector, record.vector), meta: { ...record.meta } });
    }

    hits.sort((a, b) => b.similarity - a.similarity || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return hits.slice(0, query.topK);
  }

  async stats(name: string, options?: BackendCallOptions): Promise<IndexStats> {
    throwIfAborted(options?.signal, 'stats');
    const index = this.require(name, 'stats');
    return { recordCount: index.records.size, dimension: index.config.dimension, metric: index.config.metric };
  }

  private require(name: string, operation: string): InMemoryIndex {
    const index = this.indexes.get(name);
    if (!index) {
      throw new BackendRequestError(`Index '${name}' does not exist`, 404, { operation });
    }
    return index;
  }
}
