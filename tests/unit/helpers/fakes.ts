/**
 * In-process provider stand-ins for unit tests
 *
 * @module tests/unit/helpers/fakes
 */

import type { EmbeddingVector } from '../../../src/models/embedding.js';
import type { Message } from '../../../src/models/message.js';
import type { LocatedTermsByPage } from '../../../src/models/bounds.js';
import type { ExtractedBlock } from '../../../src/models/extraction.js';
import type {
  CompletionProvider,
  DocumentExtractor,
  EmbeddingProvider,
} from '../../../src/services/providers/types.js';

/**
 * Bag-of-words embedder: one dimension per vocabulary word, valued by the
 * number of times the word occurs. Text without vocabulary words embeds to
 * the zero vector.
 */
export class VocabularyEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];
  private failOn: ((text: string) => boolean) | null = null;

  constructor(private readonly vocabulary: string[]) {}

  failWhen(predicate: (text: string) => boolean): void {
    this.failOn = predicate;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    this.calls.push(text);
    if (this.failOn?.(text)) {
      throw new Error('embedding backend down');
    }
    const words = text.toLowerCase().split(/[^a-z]+/);
    return Float32Array.from(this.vocabulary.map((v) => words.filter((w) => w === v).length));
  }
}

type Responder = (messages: Message[], callIndex: number) => string;

/**
 * Completion provider that records every message list it receives.
 */
export class RecordingCompletion implements CompletionProvider {
  readonly calls: Message[][] = [];

  constructor(private readonly respond: Responder = () => 'ok') {}

  async complete(messages: Message[]): Promise<string> {
    const index = this.calls.length;
    this.calls.push(messages.map((m) => ({ ...m })));
    return this.respond(messages, index);
  }
}

/**
 * Extractor that returns fixed blocks and per-term locations.
 */
export class FixedExtractor implements DocumentExtractor {
  readonly locateCalls: string[][] = [];

  constructor(
    private readonly blocks: ExtractedBlock[],
    private readonly locations: Record<string, LocatedTermsByPage> = {}
  ) {}

  async extract(): Promise<ExtractedBlock[]> {
    return this.blocks;
  }

  async locate(_bytes: Uint8Array, terms: string[]): Promise<LocatedTermsByPage> {
    this.locateCalls.push([...terms]);
    const result: LocatedTermsByPage = new Map();
    for (const term of terms) {
      const found = this.locations[term];
      if (!found) throw new Error(`no index for ${term}`);
      for (const [page, hits] of found) {
        result.set(page, [...(result.get(page) ?? []), ...hits]);
      }
    }
    return result;
  }
}

export function vector(...values: number[]): EmbeddingVector {
  return Float32Array.from(values);
}
