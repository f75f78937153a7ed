import type {
  CallOptions,
  Document,
  EmbeddingVector,
  IndexRecord,
  IngestionResult,
  Logger,
  Metadata,
  RejectedDocument
} from '../types/index.js';
import { MetadataSchema } from '../types/index.js';
import { InvalidInputError } from '../errors.js';
import { withDeadline } from '../utils/async.js';
import type { VectorEncoder } from '../embedding/VectorEncoder.js';
import type { IndexGateway } from '../index/IndexGateway.js';

export interface IngestionCoordinatorOptions {
  /** Characters of text copied into `meta.snippet`; 0 disables snippets. */
  snippetLength?: number;
  logger?: Logger;
}

interface Candidate {
  index: number;
  id: string;
  text: string;
  meta: Metadata;
}

export function makeSnippet(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Validates documents one by one, embeds the survivors in one batch and
 * upserts them in one gateway call. Bad documents are reported, not fatal.
 */
export class IngestionCoordinator {
  private readonly snippetLength: number;
  private readonly logger?: Logger;

  constructor(
    private readonly encoder: VectorEncoder,
    private readonly gateway: IndexGateway,
    opts: IngestionCoordinatorOptions = {}
  ) {
    this.snippetLength = Math.max(0, Math.floor(opts.snippetLength ?? 200));
    this.logger = opts.logger;
  }

  async ingest(documents: readonly Document[], options?: CallOptions): Promise<IngestionResult> {
    const rejected: RejectedDocument[] = [];
    const candidates = this.validate(documents, rejected);

    if (candidates.length === 0) {
      return { accepted: 0, rejected };
    }

    const deadline = withDeadline(options?.signal, options?.timeoutMs);
    try {
      const callOptions: CallOptions = { signal: deadline.signal };
      const encoded = await this.encode(candidates, rejected, callOptions);
      const records: IndexRecord[] = encoded.map(({ candidate, vector }) => ({
        id: candidate.id,
        vector,
        meta: this.withSnippet(candidate)
      }));

      const accepted = await this.gateway.upsert(records, callOptions);
      rejected.sort((a, b) => a.index - b.index);
      this.logger?.info(`Ingested ${accepted} document(s)`, { accepted, rejected: rejected.length });
      return { accepted, rejected };
    } finally {
      deadline.release();
    }
  }

  private validate(documents: readonly Document[], rejected: RejectedDocument[]): Candidate[] {
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    documents.forEach((doc, index) => {
      const id = typeof doc.id === 'string' ? doc.id : '';
      const reject = (message: string) => {
        rejected.push({ id, index, reason: InvalidInputError.name, message });
      };

      if (id.trim().length === 0) return reject('Document id must be a non-empty string');
      if (seen.has(id)) return reject(`Duplicate document id '${id}' in batch`);
      seen.add(id);

      if (typeof doc.text !== 'string' || doc.text.trim().length === 0) {
        return reject('Document text must be a non-empty, non-whitespace string');
      }

      const meta = MetadataSchema.safeParse(doc.meta ?? {});
      if (!meta.success) return reject('Document meta must map keys to strings, numbers, booleans or null');

      candidates.push({ index, id, text: doc.text, meta: meta.data });
    });

    return candidates;
  }

  private async encode(
    candidates: Candidate[],
    rejected: RejectedDocument[],
    options: CallOptions
  ): Promise<Array<{ candidate: Candidate; vector: EmbeddingVector }>> {
    try {
      const vectors = await this.encoder.encodeBatch(candidates.map((c) => c.text), options);
      return candidates.map((candidate, i) => ({ candidate, vector: vectors[i] ?? [] }));
    } catch (error) {
      if (!(error instanceof InvalidInputError)) throw error;
      this.logger?.debug('Batch encoding refused an input; encoding documents individually', { error: error.message });
    }

    const out: Array<{ candidate: Candidate; vector: EmbeddingVector }> = [];
    for (const candidate of candidates) {
      try {
        out.push({ candidate, vector: await this.encoder.encode(candidate.text, options) });
      } catch (error) {
        if (!(error instanceof InvalidInputError)) throw error;
        rejected.push({ id: candidate.id, index: candidate.index, reason: error.name, message: error.message });
      }
    }
    return out;
  }

  private withSnippet(candidate: Candidate): Metadata {
    if (this.snippetLength === 0 || 'snippet' in candidate.meta) {
      return { ...candidate.meta };
    }
    return { ...candidate.meta, snippet: makeSnippet(candidate.text, this.snippetLength) };
  }
}
