import type { EmbeddingVector } from '../../types/index.js';
import type { EmbeddingProvider, EmbedOptions } from '../types.js';

export const HASH_MODEL_ID = 'hash-v1';

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    // hash *= 16777619 (with 32-bit overflow)
    hash = (hash + ((hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24))) >>> 0;
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

/**
 * Feature-hashing embedding: each token lands in one bucket with a sign
 * taken from the hash's top bit; the result is L2-normalised.
 */
export function hashEmbedding(text: string, dimension: number): EmbeddingVector {
  const vec = new Array<number>(dimension).fill(0);

  for (const tok of tokenize(text)) {
    const h = fnv1a32(tok);
    const idx = h % dimension;
    const sign = (h & 0x80000000) ? -1 : 1;
    vec[idx] = (vec[idx] ?? 0) + sign;
  }

  let norm = 0;
  for (const v of vec) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm > 0) {
    for (let i = 0; i < vec.length; i++) vec[i] = (vec[i] ?? 0) / norm;
  }

  return vec;
}

/** Deterministic local model; needs no network and no weights. */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly model = HASH_MODEL_ID;
  readonly dimension: number;

  constructor(opts: { dimension: number }) {
    if (!Number.isInteger(opts.dimension) || opts.dimension < 1) {
      throw new RangeError(`Embedding dimension must be a positive integer, got ${opts.dimension}`);
    }
    this.dimension = opts.dimension;
  }

  async embed(texts: string[], _options?: EmbedOptions): Promise<EmbeddingVector[]> {
    return texts.map((text) => hashEmbedding(text, this.dimension));
  }
}
