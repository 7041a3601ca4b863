/**
 * Top-N and threshold retrieval over embedding candidates
 *
 * Results are ordered by descending cosine similarity. Equal scores keep
 * source order (ascending ordinal), never call-completion order.
 *
 * @module services/embedding/similarity
 */

import { cosineSimilarity } from '../../utils/math.js';
import {
  RETRIEVAL_DEFAULTS,
  type EmbeddingCandidate,
  type EmbeddingVector,
  type SimilarityResult,
} from '../../models/embedding.js';

interface ScoredCandidate {
  text: string;
  ordinal: number;
  score: number;
}

function rank(query: EmbeddingVector, candidates: Iterable<EmbeddingCandidate>): ScoredCandidate[] {
  const scored: ScoredCandidate[] = [];
  for (const c of candidates) {
    scored.push({ text: c.text, ordinal: c.ordinal, score: cosineSimilarity(query, c.vector) });
  }
  return scored.sort((a, b) => b.score - a.score || a.ordinal - b.ordinal);
}

/**
 * The `topN` candidate texts closest to the query.
 */
export function findClosest(
  query: EmbeddingVector,
  candidates: Iterable<EmbeddingCandidate>,
  topN: number = RETRIEVAL_DEFAULTS.closestTopN
): string[] {
  if (topN <= 0) return [];
  return rank(query, candidates)
    .slice(0, topN)
    .map((c) => c.text);
}

/**
 * The `topN` closest candidates scoring at or above `minScore`.
 */
export function findClosestWithScore(
  query: EmbeddingVector,
  candidates: Iterable<EmbeddingCandidate>,
  topN: number = RETRIEVAL_DEFAULTS.answerTopN,
  minScore: number = RETRIEVAL_DEFAULTS.answerMinScore
): SimilarityResult[] {
  if (topN <= 0) return [];
  return rank(query, candidates)
    .filter((c) => c.score >= minScore)
    .slice(0, topN)
    .map((c) => ({ text: c.text, score: c.score }));
}
