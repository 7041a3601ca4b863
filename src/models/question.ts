/**
 * Question configuration helpers
 *
 * The schema itself lives in utils/validation; these resolve the effective
 * values a question runs with.
 */

import type { QuestionConfig } from '../utils/validation.js';
import { DEFAULT_CHUNKING_CONFIG, type PageRange } from './chunk.js';
import { RETRIEVAL_DEFAULTS } from './embedding.js';

export type { QuestionConfig };

/**
 * Parse the page range into inclusive bounds. Empty or malformed ranges
 * produce null (no page filter).
 */
export function getPageRange(config: Pick<QuestionConfig, 'pageRange'>): PageRange | null {
  const range = config.pageRange?.trim();
  if (!range) return null;

  if (/^\d+$/.test(range)) {
    const page = parseInt(range, 10);
    return { start: page, end: page };
  }

  const parts = range.split('-').map((p) => p.trim());
  if (parts.length !== 2 || !/^\d+$/.test(parts[0]) || !/^\d+$/.test(parts[1])) {
    return null;
  }

  return { start: parseInt(parts[0], 10), end: parseInt(parts[1], 10) };
}

/** Text used to embed the question; falls back to the question itself */
export function getEffectiveQuestionTextForEmbedding(config: QuestionConfig): string {
  const forEmbedding = config.questionTextForEmbedding;
  return forEmbedding && forEmbedding.trim().length > 0 ? forEmbedding : config.questionText;
}

export function getEffectiveChunkSize(
  config: QuestionConfig,
  defaultChunkSize: number = DEFAULT_CHUNKING_CONFIG.maxChunkSize
): number {
  return config.chunkSize ?? defaultChunkSize;
}

export function getEffectiveTopN(
  config: QuestionConfig,
  defaultTopN: number = RETRIEVAL_DEFAULTS.answerTopN
): number {
  return config.topN ?? defaultTopN;
}
