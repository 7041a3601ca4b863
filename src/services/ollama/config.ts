/**
 * Ollama Provider Configuration
 *
 * One local Ollama server serves both capabilities: a chat model for
 * completions and an embedding model for retrieval. No API key required.
 *
 * @module services/ollama/config
 */

import { z } from 'zod';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

export const OLLAMA_DEFAULT_MODELS = {
  CHAT: 'llama3.1',
  EMBEDDING: 'nomic-embed-text',
} as const;

export const OllamaConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  chatModel: z.string().min(1).default(OLLAMA_DEFAULT_MODELS.CHAT),
  embeddingModel: z.string().min(1).default(OLLAMA_DEFAULT_MODELS.EMBEDDING),

  // Generation defaults
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().positive().default(4096),
  requestTimeoutMs: z.number().int().positive().default(60000),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60000),
    })
    .default({}),
});

/**
 * Invalid provider or server configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type OllamaConfigInput = z.input<typeof OllamaConfigSchema>;

export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load Ollama configuration from environment variables.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL          — Ollama server URL (default: http://localhost:11434)
 *   DOCQA_CHAT_MODEL         — Completion model (default: llama3.1)
 *   DOCQA_EMBED_MODEL        — Embedding model (default: nomic-embed-text)
 *   DOCQA_TEMPERATURE        — Generation temperature (default: 0.1)
 *   DOCQA_MAX_OUTPUT_TOKENS  — Max tokens per completion (default: 4096)
 *   DOCQA_REQUEST_TIMEOUT_MS — Per-request timeout (default: 60000)
 *
 * Overrides win over the environment.
 *
 * @throws ConfigurationError if a value is out of range
 */
export function loadOllamaConfig(overrides?: Partial<OllamaConfigInput>): OllamaConfig {
  const envConfig = {
    baseUrl: process.env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL,
    chatModel: process.env.DOCQA_CHAT_MODEL || OLLAMA_DEFAULT_MODELS.CHAT,
    embeddingModel: process.env.DOCQA_EMBED_MODEL || OLLAMA_DEFAULT_MODELS.EMBEDDING,
    temperature: parseFloatEnv('DOCQA_TEMPERATURE', 0.1),
    maxOutputTokens: parseIntEnv('DOCQA_MAX_OUTPUT_TOKENS', 4096),
    requestTimeoutMs: parseIntEnv('DOCQA_REQUEST_TIMEOUT_MS', 60000),
  };

  const result = OllamaConfigSchema.safeParse({ ...envConfig, ...overrides });
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid Ollama configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
