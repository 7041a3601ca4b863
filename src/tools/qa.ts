/**
 * Question Answering MCP Tools
 *
 * Tools: docqa_ask, docqa_suggest, docqa_summarize, docqa_chat, docqa_chat_clear
 *
 * Every answer carries a status: 'ok', 'no_content' (nothing loaded or
 * nothing relevant) or 'error' (a provider failed; text holds the message).
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/qa
 */

import { z } from 'zod';
import { requireService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { MAX_CHUNK_SIZE_OVERRIDE, MIN_CHUNK_SIZE_OVERRIDE } from '../models/index.js';
import { isValidPageRange, validateInput } from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  outcomeFields,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const AskInput = z.object({
  question: z.string().min(1).describe('Question about the loaded document'),
  question_for_embedding: z
    .string()
    .optional()
    .describe('Alternative text used for retrieval instead of the question'),
  system_message: z
    .string()
    .optional()
    .describe('Replaces the default answering instruction; retrieved pages are still appended'),
  page_range: z
    .string()
    .optional()
    .refine((v) => isValidPageRange(v), 'page_range must be "3" or "1-5"')
    .describe('Only retrieve from these pages'),
  chunk_size: z
    .number()
    .int()
    .min(MIN_CHUNK_SIZE_OVERRIDE)
    .max(MAX_CHUNK_SIZE_OVERRIDE)
    .optional()
    .describe('Re-chunk the document at this size before answering'),
  top_n: z.number().int().min(1).max(20).optional().describe('Chunks retrieved as context'),
  include_suggestions: z
    .boolean()
    .default(false)
    .describe('Also generate three follow-up questions'),
});

const SummarizeInput = z.object({
  mode: z
    .enum(['full', 'quick'])
    .default('full')
    .describe('full: one call per chunk; quick: one call over the leading chunks'),
});

const ChatInput = z.object({
  prompt: z.string().min(1),
  return_as_json: z.boolean().default(false).describe('Demand strict JSON output'),
  carry_history: z.boolean().default(false).describe('Read and extend the session history'),
  system_role: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleAsk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AskInput, params);
    const service = requireService();

    const outcome = await service.answerOutcome({
      questionText: input.question,
      questionTextForEmbedding: input.question_for_embedding,
      systemMessage: input.system_message,
      pageRange: input.page_range,
      chunkSize: input.chunk_size,
      topN: input.top_n,
    });

    const suggestions = input.include_suggestions
      ? outcomeFields(await service.suggestionsOutcome())
      : undefined;

    return formatResponse(
      successResult({
        ...outcomeFields(outcome),
        ...(suggestions && { suggestions }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleSuggest(): Promise<ToolResponse> {
  try {
    const outcome = await requireService().suggestionsOutcome();
    return formatResponse(successResult(outcomeFields(outcome)));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleSummarize(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SummarizeInput, params);
    const service = requireService();
    const outcome =
      input.mode === 'quick'
        ? await service.quickSummaryOutcome()
        : await service.summaryOutcome();
    return formatResponse(successResult({ mode: input.mode, ...outcomeFields(outcome) }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleChat(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ChatInput, params);
    const session = requireService().session;

    const result = await session.completeResult(input.prompt, {
      returnAsJson: input.return_as_json,
      carryHistory: input.carry_history,
      systemRole: input.system_role,
    });
    const text = session.settle(result);

    return formatResponse(
      successResult({
        status: result.status,
        text,
        ...(result.status === 'provider_failure' && { error: result.error }),
        history_length: session.historyLength(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleChatClear(): Promise<ToolResponse> {
  try {
    const session = requireService().session;
    const cleared = session.historyLength();
    session.clearHistory();
    return formatResponse(successResult({ cleared_messages: cleared }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const qaTools: Record<string, ToolDefinition> = {
  docqa_ask: {
    description:
      'Answer a question from the loaded document. Retrieves the most similar chunks and asks the model to cite page numbers like "Reference: [2,3]".',
    inputSchema: AskInput.shape,
    handler: handleAsk,
  },
  docqa_suggest: {
    description: 'Suggest three short questions about the loaded document',
    inputSchema: {},
    handler: handleSuggest,
  },
  docqa_summarize: {
    description:
      'Summarize the loaded document. "full" summarizes every chunk as HTML fragments; "quick" makes a single call over the first 10 chunks.',
    inputSchema: SummarizeInput.shape,
    handler: handleSummarize,
  },
  docqa_chat: {
    description:
      'Send a prompt to the completion model, optionally carrying conversation history or demanding JSON output',
    inputSchema: ChatInput.shape,
    handler: handleChat,
  },
  docqa_chat_clear: {
    description: 'Clear the conversation history used by docqa_chat with carry_history',
    inputSchema: {},
    handler: handleChatClear,
  },
};
