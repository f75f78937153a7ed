import type { CallOptions, Hit, Logger, QueryRequest } from '../types/index.js';
import { InvalidInputError } from '../errors.js';
import { withDeadline } from '../utils/async.js';
import type { VectorEncoder } from '../embedding/VectorEncoder.js';
import type { IndexGateway } from '../index/IndexGateway.js';

export class QueryCoordinator {
  constructor(
    private readonly encoder: VectorEncoder,
    private readonly gateway: IndexGateway,
    private readonly logger?: Logger
  ) {}

  /** Hits come back in gateway order; there is no re-ranking here. */
  async search(request: QueryRequest, options?: CallOptions): Promise<Hit[]> {
    if (!Number.isInteger(request.topK) || request.topK < 1) {
      throw new InvalidInputError(`topK must be an integer >= 1, got ${request.topK}`, { operation: 'search' });
    }

    const deadline = withDeadline(options?.signal, options?.timeoutMs);
    try {
      const callOptions: CallOptions = { signal: deadline.signal };
      const started = Date.now();
      const vector = await this.encoder.encode(request.queryText, callOptions);
      const hits = await this.gateway.query(vector, request.topK, request.filters, callOptions);
      this.logger?.debug('Search completed', { topK: request.topK, hits: hits.length, ms: Date.now() - started });
      return hits;
    } finally {
      deadline.release();
    }
  }
}
