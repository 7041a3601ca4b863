/**
 * Document Q&A - Zod Validation Schemas
 *
 * Input validation shared by the core services and the MCP tools.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import {
  MIN_CHUNK_SIZE_OVERRIDE,
  MAX_CHUNK_SIZE_OVERRIDE,
} from '../models/chunk.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Raised for empty or malformed required inputs, before any provider call.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failed path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * Fail fast on a missing, empty or whitespace-only string argument.
 */
export function requireNonBlank(value: string | null | undefined, name: string): string {
  if (value === null || value === undefined || value.trim().length === 0) {
    throw new ValidationError(`${name} cannot be null or whitespace.`);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUESTION CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

const SINGLE_PAGE = /^\s*\d+\s*$/;
const PAGE_NUMBER = /^\d+$/;

/**
 * Check a page range: empty, a single page ("4") or an inclusive range ("2-7").
 */
export function isValidPageRange(pageRange: string | undefined | null): boolean {
  if (!pageRange || pageRange.trim().length === 0) return true;

  if (SINGLE_PAGE.test(pageRange)) {
    return parseInt(pageRange, 10) > 0;
  }

  const parts = pageRange.split('-');
  if (parts.length !== 2) return false;
  const [rawStart, rawEnd] = parts.map((p) => p.trim());
  if (!PAGE_NUMBER.test(rawStart) || !PAGE_NUMBER.test(rawEnd)) return false;

  const start = parseInt(rawStart, 10);
  const end = parseInt(rawEnd, 10);
  return start > 0 && end > 0 && start <= end;
}

/**
 * Per-question request shaping.
 */
export const QuestionConfigSchema = z.object({
  questionText: z.string().trim().min(1, 'Question text is required'),
  questionTextForEmbedding: z.string().optional(),
  systemMessage: z.string().optional(),
  pageRange: z
    .string()
    .optional()
    .refine((v) => isValidPageRange(v), 'Page range must be a page number ("3") or a range ("1-5")'),
  chunkSize: z
    .number()
    .int()
    .min(MIN_CHUNK_SIZE_OVERRIDE, `ChunkSize must be between ${MIN_CHUNK_SIZE_OVERRIDE} and ${MAX_CHUNK_SIZE_OVERRIDE}`)
    .max(MAX_CHUNK_SIZE_OVERRIDE, `ChunkSize must be between ${MIN_CHUNK_SIZE_OVERRIDE} and ${MAX_CHUNK_SIZE_OVERRIDE}`)
    .optional(),
  topN: z
    .number()
    .int()
    .min(1, 'TopN must be between 1 and 20')
    .max(20, 'TopN must be between 1 and 20')
    .optional(),
  questionId: z.string().optional(),
});

export type QuestionConfig = z.infer<typeof QuestionConfigSchema>;
