/**
 * Sentence-Aligned Chunking Service
 *
 * Splits an unbounded block of extracted text into bounded segments. Each
 * window of `maxChunkSize` characters is cut after its last period so that
 * sentences are not truncated; a window without a usable period is hard-cut
 * at its boundary.
 *
 * @module services/chunking/chunker
 */

import { DEFAULT_CHUNKING_CONFIG, type Chunk } from '../../models/chunk.js';
import type { ExtractedBlock } from '../../models/extraction.js';
import { ValidationError } from '../../utils/validation.js';
import { renderBlock } from './block-renderer.js';

/**
 * Split a document into trimmed, non-empty chunks covering it left to right.
 *
 * A period at the very first position of a window is not a valid cut point
 * (it would yield an empty chunk), so the cut must land strictly after the
 * window start. A remainder that fits in one window is taken whole, so a
 * document no longer than `maxChunkSize` yields a single chunk.
 *
 * @param document - Raw document text
 * @param maxChunkSize - Window size in characters (default: 4000)
 * @returns Chunks in source order
 * @throws ValidationError if maxChunkSize is not a positive integer
 */
export function chunkDocument(
  document: string,
  maxChunkSize: number = DEFAULT_CHUNKING_CONFIG.maxChunkSize
): string[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new ValidationError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < document.length) {
    if (document.length - start <= maxChunkSize) {
      chunks.push(document.substring(start).trim());
      break;
    }

    const lastPeriod = document.lastIndexOf('.', start + maxChunkSize - 1);
    if (lastPeriod > start) {
      chunks.push(document.substring(start, lastPeriod + 1).trim());
      start = lastPeriod + 1;
    } else {
      chunks.push(document.substring(start, start + maxChunkSize).trim());
      start += maxChunkSize;
    }
  }

  return chunks.filter((c) => c.length > 0);
}

/**
 * Render and chunk extracted blocks, numbering chunks across the whole
 * document. Chunks cut from a page block keep that page number.
 */
export function chunkBlocks(
  blocks: ExtractedBlock[],
  maxChunkSize: number = DEFAULT_CHUNKING_CONFIG.maxChunkSize
): Chunk[] {
  const chunks: Chunk[] = [];

  for (const block of blocks) {
    const rendered = renderBlock(block);
    if (rendered === null) continue;

    const page = block.kind === 'page' ? block.page : null;
    for (const text of chunkDocument(rendered, maxChunkSize)) {
      chunks.push({ text, ordinal: chunks.length, page });
    }
  }

  return chunks;
}
