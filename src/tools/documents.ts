/**
 * Document MCP Tools
 *
 * Tools: docqa_document_load, docqa_document_status, docqa_document_chunks,
 *        docqa_document_clear
 *
 * Documents arrive as plain text or as already-extracted blocks; this server
 * does not parse PDFs.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/documents
 */

import { z } from 'zod';
import { requireService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { documentNotLoadedError, validationError } from '../server/errors.js';
import {
  MAX_CHUNK_SIZE_OVERRIDE,
  MIN_CHUNK_SIZE_OVERRIDE,
  type ExtractedBlock,
} from '../models/index.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const BlockSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('page'),
    page: z.number().int().min(1),
    text: z.string().nullable(),
  }),
  z.object({ kind: z.literal('annotations'), text: z.string() }),
  z.object({ kind: z.literal('form_fields'), text: z.string() }),
  z.object({ kind: z.literal('text'), text: z.string() }),
]);

const DocumentLoadInput = z.object({
  text: z.string().optional().describe('Plain document text'),
  blocks: z
    .array(BlockSchema)
    .optional()
    .describe('Extracted blocks: pages (1-indexed), annotations, form fields or plain text'),
  chunk_size: z
    .number()
    .int()
    .min(MIN_CHUNK_SIZE_OVERRIDE)
    .max(MAX_CHUNK_SIZE_OVERRIDE)
    .optional()
    .describe('Chunk size in characters (default: server setting)'),
});

const DocumentChunksInput = z.object({
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDocumentLoad(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentLoadInput, params);
    if ((input.text === undefined) === (input.blocks === undefined)) {
      throw validationError('Provide exactly one of text or blocks');
    }

    const service = requireService();
    const source: string | ExtractedBlock[] = input.text ?? input.blocks ?? [];
    const result = await service.loadDocument(source, { maxChunkSize: input.chunk_size });

    return formatResponse(
      successResult({
        document_id: result.documentId,
        block_count: result.blockCount,
        chunk_count: result.chunkCount,
        chunk_size: result.chunkSize,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentStatus(): Promise<ToolResponse> {
  try {
    const status = requireService().status();
    return formatResponse(
      successResult({
        loaded: status.loaded,
        document_id: status.documentId,
        chunk_count: status.chunkCount,
        chunk_size: status.chunkSize,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentChunks(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentChunksInput, params);
    const service = requireService();
    if (service.chunkCount() === 0) {
      throw documentNotLoadedError();
    }

    const chunks = service.getChunks();
    return formatResponse(
      successResult({
        total: chunks.length,
        offset: input.offset,
        chunks: chunks.slice(input.offset, input.offset + input.limit).map((c) => ({
          ordinal: c.ordinal,
          page: c.page,
          length: c.text.length,
          text: c.text,
        })),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentClear(): Promise<ToolResponse> {
  try {
    const service = requireService();
    const previous = service.status().documentId;
    service.clearDocument();
    return formatResponse(successResult({ cleared: previous !== null, document_id: previous }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const documentTools: Record<string, ToolDefinition> = {
  docqa_document_load: {
    description:
      'Load a document (plain text or extracted blocks), chunk it at sentence boundaries and build the retrieval index. Replaces the loaded document only if indexing succeeds.',
    inputSchema: DocumentLoadInput.shape,
    handler: handleDocumentLoad,
  },
  docqa_document_status: {
    description: 'Show whether a document is loaded, its id, chunk count and chunk size',
    inputSchema: {},
    handler: handleDocumentStatus,
  },
  docqa_document_chunks: {
    description: 'List the chunks of the loaded document in source order',
    inputSchema: DocumentChunksInput.shape,
    handler: handleDocumentChunks,
  },
  docqa_document_clear: {
    description: 'Unload the current document and clear conversation history',
    inputSchema: {},
    handler: handleDocumentClear,
  },
};
