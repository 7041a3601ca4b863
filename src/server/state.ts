/**
 * MCP Server State Management
 *
 * Holds the server configuration and the single Q&A service instance the
 * tools operate on.
 *
 * @module server/state
 */

import { z } from 'zod';
import { DEFAULT_CHUNKING_CONFIG, MAX_CHUNK_SIZE_OVERRIDE, MIN_CHUNK_SIZE_OVERRIDE } from '../models/chunk.js';
import { RETRIEVAL_DEFAULTS } from '../models/embedding.js';
import { DocumentQAService } from '../services/qa/document-qa-service.js';
import {
  ConfigurationError,
  OllamaCompletionProvider,
  OllamaEmbeddingProvider,
  getSharedClient,
} from '../services/ollama/index.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

const ServerConfigSchema = z.object({
  chunkSize: z
    .number()
    .int()
    .min(MIN_CHUNK_SIZE_OVERRIDE)
    .max(MAX_CHUNK_SIZE_OVERRIDE)
    .default(DEFAULT_CHUNKING_CONFIG.maxChunkSize),
  topN: z.number().int().min(1).max(20).default(RETRIEVAL_DEFAULTS.answerTopN),
  minScore: z.number().min(-1).max(1).default(RETRIEVAL_DEFAULTS.answerMinScore),
  failurePolicy: z.enum(['empty', 'throw']).default('empty'),
});

function numberEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load server configuration from environment variables.
 *
 * Environment variables:
 *   DOCQA_CHUNK_SIZE      — Default chunk size (default: 4000)
 *   DOCQA_TOP_N           — Chunks retrieved per question (default: 5)
 *   DOCQA_MIN_SCORE       — Similarity threshold (default: 0.5)
 *   DOCQA_FAILURE_POLICY  — 'empty' or 'throw' (default: empty)
 *
 * @throws ConfigurationError if a value is invalid
 */
export function loadServerConfig(overrides?: Partial<ServerConfig>): ServerConfig {
  const result = ServerConfigSchema.safeParse({
    chunkSize: numberEnv('DOCQA_CHUNK_SIZE'),
    topN: numberEnv('DOCQA_TOP_N'),
    minScore: numberEnv('DOCQA_MIN_SCORE'),
    failurePolicy: process.env.DOCQA_FAILURE_POLICY || undefined,
    ...overrides,
  });
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid server configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  service: null,
  config: ServerConfigSchema.parse({}),
};

/**
 * Get the Q&A service, creating it over the shared Ollama client on first use.
 */
export function requireService(): DocumentQAService {
  if (!state.service) {
    const client = getSharedClient();
    state.service = new DocumentQAService({
      embedder: new OllamaEmbeddingProvider(client),
      completion: new OllamaCompletionProvider(client),
      chunkSize: state.config.chunkSize,
      topN: state.config.topN,
      minScore: state.config.minScore,
      failurePolicy: state.config.failurePolicy,
    });
  }
  return state.service;
}

/**
 * Replace the server configuration. Drops the current service so the next
 * call to requireService() picks the new values up.
 */
export function configureServer(config: ServerConfig): void {
  state.config = { ...config };
  state.service = null;
}

/**
 * Install a specific service instance (tests, embedding hosts).
 */
export function setService(service: DocumentQAService): void {
  state.service = service;
}

/**
 * Reset state to defaults (for testing)
 */
export function resetState(): void {
  state.service = null;
  state.config = ServerConfigSchema.parse({});
}
