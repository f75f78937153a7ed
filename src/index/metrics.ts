import type { EmbeddingVector, SimilarityMetric, VectorPrecision } from '../types/index.js';

export function dot(a: EmbeddingVector, b: EmbeddingVector): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

export function norm(a: EmbeddingVector): number {
  return Math.sqrt(dot(a, a));
}

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  const denom = norm(a) * norm(b);
  return denom > 0 ? dot(a, b) / denom : 0;
}

export function euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/** Larger is closer for every metric; euclidean maps distance into (0, 1]. */
export function similarity(metric: SimilarityMetric, a: EmbeddingVector, b: EmbeddingVector): number {
  switch (metric) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dot':
      return dot(a, b);
    case 'euclidean':
      return 1 / (1 + euclideanDistance(a, b));
  }
}

const QUANT_LEVELS: Record<Exclude<VectorPrecision, 'float32'>, number> = {
  int16: 32767,
  int8: 127
};

/**
 * Round a vector to what the index keeps at the given precision. Integer
 * precisions use symmetric per-vector scaling, so the result is the
 * dequantised approximation.
 */
export function quantize(vector: EmbeddingVector, precision: VectorPrecision): EmbeddingVector {
  if (precision === 'float32') return vector.map((v) => Math.fround(v));

  const levels = QUANT_LEVELS[precision];
  let maxAbs = 0;
  for (const v of vector) maxAbs = Math.max(maxAbs, Math.abs(v));
  if (maxAbs === 0) return vector.map(() => 0);

  const scale = maxAbs / levels;
  return vector.map((v) => Math.round(v / scale) * scale);
}
