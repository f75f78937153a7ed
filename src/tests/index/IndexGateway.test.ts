import { describe, expect, it, vi } from 'vitest';
import { IndexGateway } from '../../index/IndexGateway.js';
import { InMemoryIndexBackend } from '../../index/backends/InMemoryIndexBackend.js';
import type { IndexBackend } from '../../index/types.js';
import {
  BackendAuthError,
  BackendUnavailableError,
  CancelledError,
  ConfigMismatchError,
  DimensionMismatchError,
  InvalidInputError,
  TransientBackendError
} from '../../errors.js';
import type { Hit, IndexConfig, IndexRecord } from '../../types/index.js';
import { createMockLogger } from '../helpers/logger.js';

const config: IndexConfig = { name: 'docs', dimension: 3, metric: 'cosine', precision: 'float32' };
const noDelay = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

function stubBackend(overrides: Partial<IndexBackend> = {}): IndexBackend {
  return {
    kind: 'stub',
    describeIndex: vi.fn().mockResolvedValue(null),
    createIndex: vi.fn().mockResolvedValue(undefined),
    upsert: vi.fn().mockResolvedValue(undefined),
    query: vi.fn().mockResolvedValue([]),
    stats: vi.fn().mockResolvedValue({ recordCount: 0, dimension: 3, metric: 'cosine' }),
    ...overrides
  };
}

describe('IndexGateway', () => {
  describe('ensureIndex', () => {
    it('should create a missing index and reuse it afterwards', async () => {
      const backend = new InMemoryIndexBackend();
      const createSpy = vi.spyOn(backend, 'createIndex');
      const gateway = new IndexGateway(backend, config);

      await expect(gateway.ensureIndex()).resolves.toEqual({ ...config, recordCount: 0 });
      await expect(gateway.ensureIndex()).resolves.toEqual({ ...config, recordCount: 0 });
      expect(createSpy).toHaveBeenCalledTimes(1);
    });

    it('should refuse an existing index with another dimension or metric', async () => {
      const backend = stubBackend({
        describeIndex: vi.fn().mockResolvedValue({
          name: 'docs',
          dimension: 768,
          metric: 'cosine',
          precision: 'float32',
          recordCount: 10
        })
      });
      const gateway = new IndexGateway(backend, config);

      await expect(gateway.ensureIndex()).rejects.toThrow(
        "Index 'docs' exists with dimension 768/cosine, configured 3/cosine; create a new index instead"
      );
      await expect(gateway.ensureIndex()).rejects.toBeInstanceOf(ConfigMismatchError);
      expect(backend.createIndex).not.toHaveBeenCalled();
    });

    it('should only warn about a differing precision', async () => {
      const logger = createMockLogger();
      const backend = stubBackend({
        describeIndex: vi.fn().mockResolvedValue({ ...config, precision: 'int8', recordCount: 4 })
      });
      const gateway = new IndexGateway(backend, config, { logger });

      await expect(gateway.ensureIndex()).resolves.toMatchObject({ recordCount: 4 });
      expect(logger.warn).toHaveBeenCalledWith("Index 'docs' uses precision int8, configured float32");
    });
  });

  describe('upsert', () => {
    it('should reject a wrong-length vector before any backend call', async () => {
      const backend = stubBackend();
      const gateway = new IndexGateway(backend, config);

      const error = await gateway
        .upsert([
          { id: 'a', vector: [1, 0, 0], meta: {} },
          { id: 'b', vector: [1, 0], meta: {} }
        ])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DimensionMismatchError);
      expect(error).toMatchObject({
        message: "Vector dimension 2 does not match configured dimension 3 for record 'b'",
        context: { operation: 'upsert', id: 'b', batchIndex: 1 }
      });
      expect(backend.upsert).not.toHaveBeenCalled();
    });

    it('should reject empty ids', async () => {
      const gateway = new IndexGateway(stubBackend(), config);

      await expect(gateway.upsert([{ id: ' ', vector: [1, 0, 0], meta: {} }])).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('should skip the backend for an empty list', async () => {
      const backend = stubBackend();
      const gateway = new IndexGateway(backend, config);

      await expect(gateway.upsert([])).resolves.toBe(0);
      expect(backend.upsert).not.toHaveBeenCalled();
    });

    it('should send the whole call to the backend and return the count', async () => {
      const backend = stubBackend();
      const gateway = new IndexGateway(backend, config);
      const records: IndexRecord[] = [
        { id: 'a', vector: [1, 0, 0], meta: {} },
        { id: 'b', vector: [0, 1, 0], meta: { x: 1 } }
      ];

      await expect(gateway.upsert(records)).resolves.toBe(2);
      expect(backend.upsert).toHaveBeenCalledWith('docs', records, { signal: undefined });
    });
  });

  describe('query', () => {
    it('should order backend hits by similarity then id and trim to topK', async () => {
      const hits: Hit[] = [
        { id: 'c', similarity: 0.2, meta: {} },
        { id: 'b', similarity: 0.9, meta: {} },
        { id: 'a', similarity: 0.9, meta: {} },
        { id: 'd', similarity: 0.5, meta: {} }
      ];
      const gateway = new IndexGateway(stubBackend({ query: vi.fn().mockResolvedValue(hits) }), config);

      const result = await gateway.query([1, 0, 0], 3);

      expect(result.map((h) => h.id)).toEqual(['a', 'b', 'd']);
    });

    it('should validate topK and the query dimension', async () => {
      const backend = stubBackend();
      const gateway = new IndexGateway(backend, config);

      await expect(gateway.query([1, 0, 0], 0)).rejects.toThrow('topK must be a positive integer, got 0');
      await expect(gateway.query([1, 0], 1)).rejects.toBeInstanceOf(DimensionMismatchError);
      expect(backend.query).not.toHaveBeenCalled();
    });

    it('should pass filters through', async () => {
      const backend = stubBackend();
      const gateway = new IndexGateway(backend, config);

      await gateway.query([1, 0, 0], 2, { lang: 'en' });

      expect(backend.query).toHaveBeenCalledWith('docs', { vector: [1, 0, 0], topK: 2, filters: { lang: 'en' } }, {
        signal: undefined
      });
    });
  });

  describe('retries', () => {
    it('should retry transient failures and then succeed', async () => {
      const logger = createMockLogger();
      const stats = vi
        .fn()
        .mockRejectedValueOnce(new TransientBackendError('connection reset'))
        .mockRejectedValueOnce(new TransientBackendError('connection reset'))
        .mockResolvedValue({ recordCount: 7, dimension: 3, metric: 'cosine' });
      const gateway = new IndexGateway(stubBackend({ stats }), config, { retry: noDelay, logger });

      await expect(gateway.stats()).resolves.toEqual({ recordCount: 7, dimension: 3, metric: 'cosine' });
      expect(stats).toHaveBeenCalledTimes(3);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith('Index stats failed, retrying in 0ms', {
        attempt: 1,
        error: 'connection reset'
      });
    });

    it('should return the upsert count when the third attempt succeeds', async () => {
      const upsert = vi
        .fn()
        .mockRejectedValueOnce(new TransientBackendError('connection reset'))
        .mockRejectedValueOnce(new TransientBackendError('timeout'))
        .mockResolvedValue(undefined);
      const gateway = new IndexGateway(stubBackend({ upsert }), config, { retry: noDelay });

      await expect(gateway.upsert([{ id: 'a', vector: [1, 0, 0], meta: {} }])).resolves.toBe(1);
      expect(upsert).toHaveBeenCalledTimes(3);
    });

    it('should return the query hits when the third attempt succeeds', async () => {
      const query = vi
        .fn()
        .mockRejectedValueOnce(new TransientBackendError('connection reset'))
        .mockRejectedValueOnce(new TransientBackendError('timeout'))
        .mockResolvedValue([{ id: 'a', similarity: 0.9, meta: {} }]);
      const gateway = new IndexGateway(stubBackend({ query }), config, { retry: noDelay });

      const hits = await gateway.query([1, 0, 0], 1);

      expect(hits.map((h) => h.id)).toEqual(['a']);
      expect(query).toHaveBeenCalledTimes(3);
    });

    it('should give up with BackendUnavailableError after the configured attempts', async () => {
      const query = vi.fn().mockRejectedValue(new TransientBackendError('down', 503));
      const gateway = new IndexGateway(stubBackend({ query }), config, { retry: noDelay });

      const error = await gateway.query([1, 0, 0], 1).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendUnavailableError);
      expect(error).toMatchObject({
        message: 'Index service unavailable during query after 3 attempt(s): down',
        attempts: 3,
        context: { operation: 'query', index: 'docs' }
      });
      expect(query).toHaveBeenCalledTimes(3);
    });

    it('should not retry authentication failures', async () => {
      const upsert = vi.fn().mockRejectedValue(new BackendAuthError('forbidden', 403));
      const gateway = new IndexGateway(stubBackend({ upsert }), config, { retry: noDelay });

      await expect(gateway.upsert([{ id: 'a', vector: [1, 0, 0], meta: {} }])).rejects.toBeInstanceOf(BackendAuthError);
      expect(upsert).toHaveBeenCalledTimes(1);
    });

    it('should stop when the caller cancels', async () => {
      const stats = vi.fn().mockResolvedValue({ recordCount: 0, dimension: 3, metric: 'cosine' });
      const gateway = new IndexGateway(stubBackend({ stats }), config, { retry: noDelay });
      const controller = new AbortController();
      controller.abort();

      await expect(gateway.stats({ signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
      expect(stats).not.toHaveBeenCalled();
    });

    it('should cancel a backoff wait when the timeout expires', async () => {
      const stats = vi.fn().mockRejectedValue(new TransientBackendError('busy', 429));
      const gateway = new IndexGateway(stubBackend({ stats }), config, {
        retry: { attempts: 5, baseDelayMs: 1000, maxDelayMs: 1000 }
      });

      await expect(gateway.stats({ timeoutMs: 30 })).rejects.toBeInstanceOf(CancelledError);
      expect(stats).toHaveBeenCalledTimes(1);
    });
  });
});
