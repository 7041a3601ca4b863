/**
 * Embedding interfaces for the retrieval index
 *
 * Vectors are opaque beyond cosine comparison. Each vector is owned by the
 * index entry that created it.
 */

/** Fixed-length vector produced by an embedding provider */
export type EmbeddingVector = Float32Array;

/**
 * Retrieval defaults.
 * Question answering uses threshold retrieval; the plain "closest" lookup
 * used for simple context selection takes the top 2 with no threshold.
 */
export const RETRIEVAL_DEFAULTS = {
  answerTopN: 5,
  answerMinScore: 0.5,
  closestTopN: 2,
} as const;

/**
 * A candidate for similarity search
 */
export interface EmbeddingCandidate {
  text: string;
  vector: EmbeddingVector;
  /** Deterministic tie-break key (source order) */
  ordinal: number;
  page: number | null;
}

/**
 * Chunk text paired with its cosine similarity to the query
 */
export interface SimilarityResult {
  text: string;
  score: number;
}
