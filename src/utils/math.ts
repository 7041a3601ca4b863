/**
 * Vector math for similarity search.
 *
 * Normalization happens at comparison time, so stored vectors and query
 * vectors never need to be pre-normalized.
 */

/**
 * Cosine similarity between two vectors of equal length.
 * Returns 0 when either vector has zero magnitude.
 *
 * @throws Error if the vectors differ in length
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
