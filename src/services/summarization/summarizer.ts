/**
 * Iterative Summarizer
 *
 * One completion per chunk against a fixed system prompt. The chunk message
 * is removed again after every call, so the provider only ever sees
 * [system, chunk]. A failed chunk is skipped; later chunks still run.
 *
 * @module services/summarization/summarizer
 */

import type { Message } from '../../models/message.js';
import type { ConversationSession } from '../conversation/session.js';

export const SUMMARY_SYSTEM_PROMPT =
  'You are a helpful assistant. Your task is to analyze the provided text and generate short summary. Always respond in proper HTML format, but do not include <html>, <head>, or <body> tags.';

export const NO_SUMMARY_GENERATED = 'No summary could be generated.';

export interface SummaryOutcome {
  summary: string;
  /** Chunks that produced non-empty output */
  summarized: number;
  /** Chunks whose completion failed */
  failed: number;
}

/**
 * Summarize chunks in order and join the non-empty outputs with a space.
 */
export async function summarizeChunks(
  session: ConversationSession,
  chunks: string[],
  systemPrompt: string = SUMMARY_SYSTEM_PROMPT
): Promise<SummaryOutcome> {
  const history: Message[] = [{ role: 'system', content: systemPrompt }];
  const parts: string[] = [];
  let failed = 0;

  for (const chunk of chunks) {
    history.push({ role: 'user', content: chunk });
    try {
      const result = await session.exchange(history);
      if (result.status === 'provider_failure') {
        failed++;
      } else if (result.text.trim().length > 0) {
        parts.push(result.text);
      }
    } finally {
      history.pop();
    }
  }

  if (failed > 0) {
    console.error(`[Summarizer] ${failed} of ${chunks.length} chunks failed to summarize`);
  }

  return {
    summary: parts.length > 0 ? parts.join(' ') : NO_SUMMARY_GENERATED,
    summarized: parts.length,
    failed,
  };
}
