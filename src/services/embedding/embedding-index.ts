/**
 * EmbeddingIndex - in-memory chunk text -> vector map
 *
 * ATOMIC: an index is either fully built or not built at all. A failing
 * embedding call aborts the build and the caller keeps whatever index it
 * had before.
 *
 * Chunks are embedded sequentially in source order and blank chunks are
 * skipped. Duplicate chunk texts collapse into one entry: the last vector
 * wins, the first ordinal is kept.
 *
 * @module services/embedding/embedding-index
 */

import type { Chunk, PageRange } from '../../models/chunk.js';
import {
  RETRIEVAL_DEFAULTS,
  type EmbeddingCandidate,
  type EmbeddingVector,
  type SimilarityResult,
} from '../../models/embedding.js';
import type { EmbeddingProvider } from '../providers/types.js';
import { EmbeddingError } from './errors.js';
import { findClosest, findClosestWithScore } from './similarity.js';

export class EmbeddingIndex {
  private readonly entries: Map<string, EmbeddingCandidate>;

  private constructor(entries: Map<string, EmbeddingCandidate>) {
    this.entries = entries;
  }

  static empty(): EmbeddingIndex {
    return new EmbeddingIndex(new Map());
  }

  /**
   * Embed every chunk and build a new index.
   *
   * @throws EmbeddingError on the first failed or malformed embedding
   */
  static async build(chunks: Chunk[], provider: EmbeddingProvider): Promise<EmbeddingIndex> {
    const entries = new Map<string, EmbeddingCandidate>();
    let dimension: number | null = null;

    for (const chunk of chunks) {
      if (chunk.text.trim().length === 0) continue;

      let vector: EmbeddingVector;
      try {
        vector = await provider.embed(chunk.text);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[EmbeddingIndex] Embedding failed for chunk ${chunk.ordinal}: ${message}`);
        throw new EmbeddingError(
          `Failed to embed chunk ${chunk.ordinal}: ${message}`,
          'EMBEDDING_FAILED',
          { ordinal: chunk.ordinal, chunkCount: chunks.length }
        );
      }

      if (dimension === null) {
        dimension = vector.length;
      } else if (vector.length !== dimension) {
        throw new EmbeddingError(
          `Vector dimension mismatch for chunk ${chunk.ordinal}: got ${vector.length}, expected ${dimension}`,
          'DIMENSION_MISMATCH',
          { ordinal: chunk.ordinal, expected: dimension, actual: vector.length }
        );
      }

      const existing = entries.get(chunk.text);
      entries.set(chunk.text, {
        text: chunk.text,
        vector,
        ordinal: existing?.ordinal ?? chunk.ordinal,
        page: existing?.page ?? chunk.page,
      });
    }

    return new EmbeddingIndex(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  /** Chunk texts in source order */
  keys(): string[] {
    return this.sortedCandidates().map((c) => c.text);
  }

  /**
   * Top-N closest chunk texts, no threshold.
   *
   * @param pages - When set, only chunks cut from pages inside the range are considered
   */
  findClosest(
    query: EmbeddingVector,
    topN: number = RETRIEVAL_DEFAULTS.closestTopN,
    pages: PageRange | null = null
  ): string[] {
    return findClosest(query, this.candidates(pages), topN);
  }

  /**
   * Top-N closest chunks at or above `minScore`, with scores.
   *
   * @param pages - When set, only chunks cut from pages inside the range are considered
   */
  findClosestWithScore(
    query: EmbeddingVector,
    topN: number = RETRIEVAL_DEFAULTS.answerTopN,
    minScore: number = RETRIEVAL_DEFAULTS.answerMinScore,
    pages: PageRange | null = null
  ): SimilarityResult[] {
    return findClosestWithScore(query, this.candidates(pages), topN, minScore);
  }

  private sortedCandidates(): EmbeddingCandidate[] {
    return [...this.entries.values()].sort((a, b) => a.ordinal - b.ordinal);
  }

  private candidates(pages: PageRange | null): EmbeddingCandidate[] {
    const all = this.sortedCandidates();
    if (pages === null) return all;
    return all.filter((c) => c.page !== null && c.page >= pages.start && c.page <= pages.end);
  }
}
