/**
 * Chunk interfaces for the document Q&A core
 *
 * A chunk is a sentence-aligned fragment of extracted document text.
 * Chunks are created by the chunker and owned by the embedding index once indexed.
 */

/**
 * Configuration for text chunking
 */
export interface ChunkingConfig {
  /** Maximum characters per chunk (default: 4000) */
  maxChunkSize: number;
}

/**
 * Default chunking configuration
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxChunkSize: 4000,
};

/** Bounds accepted for a per-request chunk size override */
export const MIN_CHUNK_SIZE_OVERRIDE = 100;
export const MAX_CHUNK_SIZE_OVERRIDE = 10000;

/**
 * An ordered fragment of extracted text
 */
export interface Chunk {
  /** Non-empty, trimmed chunk text */
  readonly text: string;

  /** 0-indexed position in the source sequence */
  readonly ordinal: number;

  /** 1-indexed page the chunk was cut from, null for non-page blocks */
  readonly page: number | null;
}

/**
 * Inclusive 1-indexed page bounds used to restrict retrieval
 */
export interface PageRange {
  readonly start: number;
  readonly end: number;
}
