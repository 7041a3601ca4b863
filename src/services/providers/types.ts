/**
 * External capability contracts
 *
 * The core only ever talks to these interfaces. Timeouts and cancellation are
 * properties of the implementations and pass through untouched.
 *
 * @module services/providers/types
 */

import type { EmbeddingVector } from '../../models/embedding.js';
import type { Message } from '../../models/message.js';
import type { ExtractedBlock } from '../../models/extraction.js';
import type { LocatedTermsByPage } from '../../models/bounds.js';

/**
 * Produces a vector for one text. Deterministic for identical input within
 * a session.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingVector>;
}

/**
 * Produces a completion for an ordered message list.
 */
export interface CompletionProvider {
  complete(messages: Message[]): Promise<string>;
}

/**
 * Reads a document: text blocks for indexing, and term locations for
 * highlighting.
 */
export interface DocumentExtractor {
  extract(bytes: Uint8Array, mediaType: string): Promise<ExtractedBlock[]>;
  locate(bytes: Uint8Array, terms: string[]): Promise<LocatedTermsByPage>;
}

type ProviderKind = 'embedding' | 'completion' | 'extraction';

/**
 * A provider call threw or returned an error.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: ProviderKind,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
