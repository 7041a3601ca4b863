/**
 * DocumentQAService - retrieval-augmented answering over one loaded document
 *
 * Owns the retrieval index, the chunks it was built from, the source blocks
 * (kept so a per-question chunk size can re-index) and a conversation
 * session. Nothing here is safe for concurrent callers; one service instance
 * serves one document at a time.
 *
 * Loading is atomic: a failed load leaves the previously loaded document
 * in place.
 *
 * @module services/qa/document-qa-service
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_CHUNKING_CONFIG, type Chunk } from '../../models/chunk.js';
import { RETRIEVAL_DEFAULTS, type SimilarityResult } from '../../models/embedding.js';
import { SUPPORTED_MEDIA_TYPE, type ExtractedBlock } from '../../models/extraction.js';
import type { LocatedTerm, LocatedTermsByPage, MergedBoundsByPage } from '../../models/bounds.js';
import type { CompletionResult } from '../../models/message.js';
import {
  getEffectiveQuestionTextForEmbedding,
  getEffectiveTopN,
  getPageRange,
} from '../../models/question.js';
import {
  QuestionConfigSchema,
  ValidationError,
  requireNonBlank,
  validateInput,
} from '../../utils/validation.js';
import { chunkBlocks } from '../chunking/chunker.js';
import { renderBlock } from '../chunking/block-renderer.js';
import { EmbeddingIndex } from '../embedding/embedding-index.js';
import { ConversationSession, type FailurePolicy } from '../conversation/session.js';
import { summarizeChunks } from '../summarization/summarizer.js';
import { processLocatedTerms } from '../bounds/merger.js';
import {
  ProviderError,
  type CompletionProvider,
  type DocumentExtractor,
  type EmbeddingProvider,
} from '../providers/types.js';
import { errorOutcome, renderOutcome, type QAOperation, type QAOutcome } from './outcome.js';
import {
  CONTEXT_CHUNK_LIMIT,
  NO_CONTENT_AVAILABLE,
  NO_QUICK_SUMMARY,
  NO_RELEVANT_CONTENT,
  QUICK_SUMMARY_PROMPT,
  SUGGESTIONS_PROMPT,
  buildAnswerSystemPrompt,
  buildSensitiveTermsPrompt,
  parseTermList,
} from './prompts.js';

export interface DocumentQAServiceOptions {
  embedder: EmbeddingProvider;
  completion: CompletionProvider;
  /** Needed only for loadFile and findTextBounds */
  extractor?: DocumentExtractor;
  chunkSize?: number;
  topN?: number;
  minScore?: number;
  failurePolicy?: FailurePolicy;
}

export interface LoadOptions {
  maxChunkSize?: number;
}

export interface LoadResult {
  documentId: string;
  blockCount: number;
  chunkCount: number;
  chunkSize: number;
}

export interface DocumentStatus {
  loaded: boolean;
  documentId: string | null;
  chunkCount: number;
  chunkSize: number;
}

/** Question input before validation; see QuestionConfigSchema */
export type QuestionInput = Record<string, unknown>;

export class DocumentQAService {
  readonly session: ConversationSession;

  private readonly embedder: EmbeddingProvider;
  private readonly extractor: DocumentExtractor | undefined;
  private readonly defaultChunkSize: number;
  private readonly topN: number;
  private readonly minScore: number;

  private index: EmbeddingIndex = EmbeddingIndex.empty();
  private blocks: ExtractedBlock[] = [];
  private chunks: Chunk[] = [];
  private chunkSize: number;
  private documentId: string | null = null;

  constructor(options: DocumentQAServiceOptions) {
    this.embedder = options.embedder;
    this.extractor = options.extractor;
    this.defaultChunkSize = options.chunkSize ?? DEFAULT_CHUNKING_CONFIG.maxChunkSize;
    this.topN = options.topN ?? RETRIEVAL_DEFAULTS.answerTopN;
    this.minScore = options.minScore ?? RETRIEVAL_DEFAULTS.answerMinScore;
    this.chunkSize = this.defaultChunkSize;
    this.session = new ConversationSession(options.completion, {
      failurePolicy: options.failurePolicy,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LOADING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Chunk and index a document given as plain text or extracted blocks.
   *
   * @throws ValidationError if there is no non-blank content
   * @throws EmbeddingError if any chunk fails to embed (nothing is replaced)
   */
  async loadDocument(
    input: string | ExtractedBlock[],
    options: LoadOptions = {}
  ): Promise<LoadResult> {
    let blocks: ExtractedBlock[];
    if (typeof input === 'string') {
      requireNonBlank(input, 'Document content');
      blocks = [{ kind: 'text', text: input }];
    } else {
      blocks = input.filter((b) => renderBlock(b) !== null);
      if (blocks.length === 0) {
        throw new ValidationError('Document content cannot be null or whitespace.');
      }
    }

    const chunkSize = options.maxChunkSize ?? this.defaultChunkSize;
    const chunks = chunkBlocks(blocks, chunkSize);
    const index = await EmbeddingIndex.build(chunks, this.embedder);

    this.blocks = blocks;
    this.chunks = chunks;
    this.index = index;
    this.chunkSize = chunkSize;
    this.documentId = uuidv4();

    console.error(
      `[DocumentQA] Loaded document ${this.documentId}: ${blocks.length} blocks, ${chunks.length} chunks, ${index.size} indexed (chunkSize=${chunkSize})`
    );

    return {
      documentId: this.documentId,
      blockCount: blocks.length,
      chunkCount: index.size,
      chunkSize,
    };
  }

  /**
   * Extract a document through the configured extractor, then load it.
   *
   * @throws ValidationError for unsupported media types
   * @throws ProviderError if no extractor is configured or extraction fails
   */
  async loadFile(
    bytes: Uint8Array,
    mediaType: string,
    options: LoadOptions = {}
  ): Promise<LoadResult> {
    if (mediaType.toLowerCase() !== SUPPORTED_MEDIA_TYPE) {
      throw new ValidationError('Only PDF documents are supported.');
    }
    const extractor = this.requireExtractor();

    let blocks: ExtractedBlock[];
    try {
      blocks = await extractor.extract(bytes, mediaType);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Failed to load PDF document: ${message}`, 'extraction');
    }
    return this.loadDocument(blocks, options);
  }

  chunkCount(): number {
    return this.index.size;
  }

  getChunks(): Chunk[] {
    return [...this.chunks];
  }

  status(): DocumentStatus {
    return {
      loaded: !this.index.isEmpty(),
      documentId: this.documentId,
      chunkCount: this.index.size,
      chunkSize: this.chunkSize,
    };
  }

  /**
   * Drop the loaded document and the session history.
   */
  clearDocument(): void {
    this.index = EmbeddingIndex.empty();
    this.blocks = [];
    this.chunks = [];
    this.chunkSize = this.defaultChunkSize;
    this.documentId = null;
    this.session.clearHistory();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUESTION ANSWERING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Answer a question from the loaded document.
   *
   * @throws ValidationError if question is blank
   */
  async answer(question: string): Promise<string> {
    requireNonBlank(question, 'Question');
    return renderOutcome(await this.answerOutcome({ questionText: question }));
  }

  /**
   * Answer a question with per-question overrides.
   *
   * @throws ValidationError if the configuration is invalid
   */
  async askQuestion(config: QuestionInput): Promise<string> {
    return renderOutcome(await this.answerOutcome(config));
  }

  /**
   * Answer followed by suggested follow-up questions.
   *
   * @throws ValidationError if question is blank
   */
  async answerWithSuggestions(question: string): Promise<string> {
    requireNonBlank(question, 'Question');
    const answer = await this.answer(question);
    const suggestions = await this.suggestQuestions();
    return `${answer}\n\nSuggestions:\n${suggestions}`;
  }

  /**
   * @throws ValidationError if the configuration is invalid
   */
  async answerOutcome(input: QuestionInput): Promise<QAOutcome> {
    const config = validateInput(QuestionConfigSchema, input);

    if (
      config.chunkSize !== undefined &&
      config.chunkSize !== this.chunkSize &&
      this.blocks.length > 0
    ) {
      try {
        await this.reindex(config.chunkSize);
      } catch (error) {
        return errorOutcome('answer', error);
      }
    }

    if (this.index.isEmpty()) {
      return { status: 'no_content', text: NO_RELEVANT_CONTENT };
    }

    let results: SimilarityResult[];
    try {
      const query = await this.embedder.embed(getEffectiveQuestionTextForEmbedding(config));
      results = this.index.findClosestWithScore(
        query,
        getEffectiveTopN(config, this.topN),
        this.minScore,
        getPageRange(config)
      );
    } catch (error) {
      console.error(
        `[DocumentQA] Retrieval failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return errorOutcome('answer', error);
    }

    if (results.length === 0) {
      return { status: 'no_content', text: NO_RELEVANT_CONTENT };
    }

    const instruction =
      config.systemMessage && config.systemMessage.trim().length > 0
        ? config.systemMessage
        : undefined;
    const systemPrompt = buildAnswerSystemPrompt(
      results.map((r) => r.text),
      instruction
    );
    const result = await this.session.completeResult(config.questionText, {
      systemRole: systemPrompt,
    });
    return this.toOutcome('answer', result);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WHOLE-DOCUMENT PROMPTS
  // ═══════════════════════════════════════════════════════════════════════════

  async suggestQuestions(): Promise<string> {
    return renderOutcome(await this.suggestionsOutcome());
  }

  async suggestionsOutcome(): Promise<QAOutcome> {
    if (this.index.isEmpty()) {
      return { status: 'no_content', text: NO_CONTENT_AVAILABLE };
    }
    const result = await this.completeOverLeadingChunks(SUGGESTIONS_PROMPT);
    return this.toOutcome('suggestions', result);
  }

  /**
   * Summarize every chunk in order and join the results.
   */
  async summarize(): Promise<string> {
    return renderOutcome(await this.summaryOutcome());
  }

  async summaryOutcome(): Promise<QAOutcome> {
    if (this.index.isEmpty()) {
      return { status: 'no_content', text: NO_CONTENT_AVAILABLE };
    }
    const { summary } = await summarizeChunks(this.session, this.index.keys());
    return { status: 'ok', text: summary };
  }

  /**
   * Single-call summary over the leading chunks.
   */
  async quickSummary(): Promise<string> {
    return renderOutcome(await this.quickSummaryOutcome());
  }

  async quickSummaryOutcome(): Promise<QAOutcome> {
    if (this.index.isEmpty()) {
      return { status: 'no_content', text: NO_CONTENT_AVAILABLE };
    }
    const result = await this.completeOverLeadingChunks(QUICK_SUMMARY_PROMPT);
    const outcome = this.toOutcome('quick_summary', result);
    if (outcome.status === 'ok' && outcome.text.trim().length === 0) {
      return { status: 'ok', text: NO_QUICK_SUMMARY };
    }
    return outcome;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SENSITIVE TERMS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Ask the model for PII terms of the given categories found in the loaded
   * content. `text` gates the call: blank text yields no terms.
   *
   * @throws ProviderError on completion failure under the 'throw' policy
   */
  async extractSensitiveTerms(text: string, categories: string[]): Promise<string[]> {
    if (text.trim().length === 0) return [];
    const wanted = categories.filter((c) => c.trim().length > 0);
    if (wanted.length === 0) return [];
    if (this.index.isEmpty()) return [];

    const result = await this.completeOverLeadingChunks(buildSensitiveTermsPrompt(wanted));
    const answer = this.session.settle(result);
    if (answer.trim().length === 0) return [];
    return parseTermList(answer);
  }

  /**
   * Locate each term in the document and return merged display bounds per
   * page. A term the extractor fails on is logged and skipped.
   *
   * @throws ProviderError if no extractor is configured
   */
  async findTextBounds(bytes: Uint8Array, terms: string[]): Promise<MergedBoundsByPage> {
    const extractor = this.requireExtractor();
    const located: LocatedTermsByPage = new Map();

    for (const term of terms) {
      if (term.trim().length === 0) continue;
      let found: LocatedTermsByPage;
      try {
        found = await extractor.locate(bytes, [term]);
      } catch (error) {
        console.error(
          `[DocumentQA] Failed to locate "${term}": ${error instanceof Error ? error.message : String(error)}`
        );
        continue;
      }
      for (const [page, hits] of found) {
        const existing: LocatedTerm[] = located.get(page) ?? [];
        existing.push(...hits);
        located.set(page, existing);
      }
    }

    return processLocatedTerms(located);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  private async reindex(chunkSize: number): Promise<void> {
    const chunks = chunkBlocks(this.blocks, chunkSize);
    const index = await EmbeddingIndex.build(chunks, this.embedder);
    this.chunks = chunks;
    this.index = index;
    this.chunkSize = chunkSize;
    console.error(`[DocumentQA] Re-indexed ${this.documentId}: ${index.size} chunks (chunkSize=${chunkSize})`);
  }

  /**
   * One stateless call: the prompt as system message, the leading chunks
   * joined by a space as user message.
   */
  private async completeOverLeadingChunks(systemPrompt: string): Promise<CompletionResult> {
    requireNonBlank(systemPrompt, 'System prompt');
    const context = this.index.keys().slice(0, CONTEXT_CHUNK_LIMIT).join(' ');
    return this.session.completeResult(context, { systemRole: systemPrompt });
  }

  private toOutcome(operation: QAOperation, result: CompletionResult): QAOutcome {
    try {
      return { status: 'ok', text: this.session.settle(result) };
    } catch (error) {
      return errorOutcome(operation, error);
    }
  }

  private requireExtractor(): DocumentExtractor {
    if (!this.extractor) {
      throw new ProviderError('No document extractor configured', 'extraction');
    }
    return this.extractor;
  }
}
