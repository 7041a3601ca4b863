/**
 * Sensitive Data MCP Tools
 *
 * Tools: docqa_sensitive_terms, docqa_merge_bounds
 *
 * docqa_merge_bounds takes term locations already found by a PDF text
 * search (points) and returns highlight rectangles in display pixels,
 * one per rounded position per page.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/sensitive
 */

import { z } from 'zod';
import { requireService } from '../server/state.js';
import { successResult } from '../server/types.js';
import type { LocatedTermsByPage } from '../models/index.js';
import { processLocatedTerms } from '../services/bounds/merger.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const SensitiveTermsInput = z.object({
  text: z.string().describe('Text to screen; blank text returns no terms'),
  categories: z
    .array(z.string())
    .min(1)
    .describe('PII categories to look for, e.g. "Names", "Email addresses"'),
});

const RectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().min(0),
  height: z.number().min(0),
});

const MergeBoundsInput = z.object({
  located_terms: z
    .array(
      z.object({
        term: z.string(),
        page: z.number().int(),
        rect: RectSchema,
      })
    )
    .describe('Term occurrences in document points'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleSensitiveTerms(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SensitiveTermsInput, params);
    const terms = await requireService().extractSensitiveTerms(input.text, input.categories);
    return formatResponse(successResult({ count: terms.length, terms }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleMergeBounds(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(MergeBoundsInput, params);

    const byPage: LocatedTermsByPage = new Map();
    for (const located of input.located_terms) {
      const list = byPage.get(located.page) ?? [];
      list.push(located);
      byPage.set(located.page, list);
    }

    const merged = processLocatedTerms(byPage);
    const pages = [...merged.entries()]
      .sort(([a], [b]) => a - b)
      .map(([page, bounds]) => ({
        page,
        bounds: bounds.map((b) => ({ term: b.term, ...b.bounds })),
      }));

    return formatResponse(
      successResult({
        input_count: input.located_terms.length,
        merged_count: pages.reduce((sum, p) => sum + p.bounds.length, 0),
        pages,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const sensitiveTools: Record<string, ToolDefinition> = {
  docqa_sensitive_terms: {
    description:
      'Ask the model for personally identifiable information of the given categories found in the loaded document. Returns a case-insensitively deduplicated list.',
    inputSchema: SensitiveTermsInput.shape,
    handler: handleSensitiveTerms,
  },
  docqa_merge_bounds: {
    description:
      'Convert located term rectangles from PDF points to padded display pixels and keep the widest rectangle per rounded position per page',
    inputSchema: MergeBoundsInput.shape,
    handler: handleMergeBounds,
  },
};
