import { z } from 'zod';

// Similarity metrics
export const SIMILARITY_METRICS = ['cosine', 'dot', 'euclidean'] as const;
export type SimilarityMetric = typeof SIMILARITY_METRICS[number];

// Storage precision of vectors inside the index
export const VECTOR_PRECISIONS = ['float32', 'int16', 'int8'] as const;
export type VectorPrecision = typeof VECTOR_PRECISIONS[number];

export const MetaScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type MetaScalar = z.infer<typeof MetaScalarSchema>;

export const MetadataSchema = z.record(z.string(), MetaScalarSchema);
export type Metadata = z.infer<typeof MetadataSchema>;

/** Equality filters over record metadata: every key must match. */
export type MetadataFilter = Metadata;

export type EmbeddingVector = number[];

export interface Document {
  id: string;
  text: string;
  meta?: Metadata;
}

export interface IndexRecord {
  id: string;
  vector: EmbeddingVector;
  meta: Metadata;
}

export interface Hit {
  id: string;
  similarity: number;
  meta: Metadata;
}

export interface QueryRequest {
  queryText: string;
  topK: number;
  filters?: MetadataFilter;
}

export interface IndexConfig {
  readonly name: string;
  readonly dimension: number;
  readonly metric: SimilarityMetric;
  readonly precision: VectorPrecision;
}

/** What the backend reports about an existing index. */
export interface IndexDescription {
  name: string;
  dimension: number;
  metric: SimilarityMetric;
  /** As reported by the backend, which may know precisions this library does not. */
  precision: string;
  recordCount: number;
}

export interface IndexStats {
  recordCount: number;
  dimension: number;
  metric: SimilarityMetric;
}

export interface RejectedDocument {
  id: string;
  /** Position of the document in the ingested sequence. */
  index: number;
  reason: string;
  message: string;
}

export interface IngestionResult {
  accepted: number;
  rejected: RejectedDocument[];
}

export interface HealthReport {
  indexReachable: boolean;
  recordCount: number;
  index: string;
  metric: SimilarityMetric;
  dimension: number;
  embeddingModel: string;
  error?: string;
}
