/**
 * Ollama Provider Client
 *
 * Completion and embedding providers backed by a locally running Ollama
 * server. Every request goes through retry with backoff, then the shared
 * circuit breaker.
 *
 * Start Ollama and pull the models before use:
 *   ollama serve
 *   ollama pull llama3.1
 *   ollama pull nomic-embed-text
 *
 * @module services/ollama/client
 */

import { z } from 'zod';
import type { EmbeddingVector } from '../../models/embedding.js';
import type { Message } from '../../models/message.js';
import { withRetry } from '../../utils/backoff.js';
import {
  ProviderError,
  type CompletionProvider,
  type EmbeddingProvider,
} from '../providers/types.js';
import { CircuitBreaker, isServerError, type CircuitBreakerStatus } from './circuit-breaker.js';
import { loadOllamaConfig, type OllamaConfig, type OllamaConfigInput } from './config.js';

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

type ProviderKind = 'completion' | 'embedding';

export interface OllamaClientStatus {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  circuitBreaker: CircuitBreakerStatus;
}

/**
 * HTTP transport shared by both providers.
 */
export class OllamaClient {
  readonly config: OllamaConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(configOverrides?: Partial<OllamaConfigInput>) {
    this.config = loadOllamaConfig(configOverrides);
    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: this.config.circuitBreaker.failureThreshold,
      recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
    });
  }

  /**
   * POST /api/chat, non-streaming
   */
  async chat(messages: Message[]): Promise<string> {
    const data = await this.request(
      '/api/chat',
      {
        model: this.config.chatModel,
        messages,
        stream: false,
        options: {
          temperature: this.config.temperature,
          num_predict: this.config.maxOutputTokens,
        },
      },
      'completion'
    );

    const parsed = ChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Malformed chat response from Ollama', 'completion');
    }
    return parsed.data.message.content;
  }

  /**
   * POST /api/embeddings
   */
  async embed(text: string): Promise<EmbeddingVector> {
    const data = await this.request(
      '/api/embeddings',
      { model: this.config.embeddingModel, prompt: text },
      'embedding'
    );

    const parsed = EmbeddingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Malformed embedding response from Ollama', 'embedding');
    }
    return Float32Array.from(parsed.data.embedding);
  }

  getStatus(): OllamaClientStatus {
    return {
      baseUrl: this.config.baseUrl,
      chatModel: this.config.chatModel,
      embeddingModel: this.config.embeddingModel,
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
  }

  private request(path: string, body: object, provider: ProviderKind): Promise<unknown> {
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;
    return this.circuitBreaker.execute(() =>
      withRetry(() => this.post(path, body, provider), isServerError, {
        maxAttempts,
        baseDelayMs,
        maxDelayMs,
        label: 'OllamaClient',
      })
    );
  }

  private async post(path: string, body: object, provider: ProviderKind): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ProviderError(`Ollama request to ${path} failed: ${message}`, provider);
      }

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new ProviderError(
          `Ollama API error ${response.status}: ${response.statusText}. ${text.slice(0, 200)}`,
          provider,
          response.status
        );
      }

      try {
        return await response.json();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ProviderError(`Ollama response from ${path} could not be read: ${message}`, provider);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export class OllamaCompletionProvider implements CompletionProvider {
  constructor(private readonly client: OllamaClient) {}

  complete(messages: Message[]): Promise<string> {
    return this.client.chat(messages);
  }
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  constructor(private readonly client: OllamaClient) {}

  embed(text: string): Promise<EmbeddingVector> {
    return this.client.embed(text);
  }
}

// ---- Shared singleton ----
let _sharedClient: OllamaClient | null = null;

export function getSharedClient(): OllamaClient {
  if (!_sharedClient) {
    _sharedClient = new OllamaClient();
  }
  return _sharedClient;
}

/** Reset shared state (for testing) */
export function resetSharedClient(): void {
  _sharedClient = null;
}
