/**
 * Unit tests for the Ollama client
 *
 * fetch is stubbed; no Ollama server is needed.
 *
 * @module tests/unit/ollama/client
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CircuitBreakerOpenError,
  OllamaClient,
  OllamaCompletionProvider,
  OllamaEmbeddingProvider,
} from '../../../src/services/ollama/index.js';
import { ProviderError } from '../../../src/services/providers/types.js';

const BASE_URL = 'http://ollama.test:11434';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(requestTimeoutMs = 60000): OllamaClient {
  return new OllamaClient({
    baseUrl: BASE_URL,
    requestTimeoutMs,
    chatModel: 'test-chat',
    embeddingModel: 'test-embed',
    temperature: 0.2,
    maxOutputTokens: 256,
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    circuitBreaker: { failureThreshold: 2, recoveryTimeMs: 60000 },
  });
}

describe('OllamaClient', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('chat', () => {
    it('should post a non-streaming chat request and return the reply', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ model: 'test-chat', message: { role: 'assistant', content: 'hi' }, done: true })
      );
      const client = createClient();

      const reply = await client.chat([{ role: 'user', content: 'hello' }]);

      expect(reply).toBe('hi');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${BASE_URL}/api/chat`);
      expect(init.method).toBe('POST');
      expect(JSON.parse(init.body)).toEqual({
        model: 'test-chat',
        messages: [{ role: 'user', content: 'hello' }],
        stream: false,
        options: { temperature: 0.2, num_predict: 256 },
      });
    });

    it('should reject a malformed reply', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ unexpected: true }));
      await expect(createClient().chat([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'Malformed chat response from Ollama'
      );
    });
  });

  describe('embed', () => {
    it('should post the text and return a Float32Array', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: [0.5, -1] }));

      const result = await createClient().embed('some text');

      expect(result).toBeInstanceOf(Float32Array);
      expect(Array.from(result)).toEqual([0.5, -1]);
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/api/embeddings`);
      expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
        model: 'test-embed',
        prompt: 'some text',
      });
    });
  });

  describe('retry and circuit breaker', () => {
    it('should retry a server error and return the later success', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ error: 'loading' }, 503, 'Service Unavailable'))
        .mockResolvedValueOnce(jsonResponse({ embedding: [1] }));

      const result = await createClient().embed('x');

      expect(Array.from(result)).toEqual([1]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should not retry a client error', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: 'model not found' }, 400, 'Bad Request')
      );

      const call = createClient().embed('x');

      await expect(call).rejects.toBeInstanceOf(ProviderError);
      await expect(call).rejects.toMatchObject({
        message: 'Ollama API error 400: Bad Request. {"error":"model not found"}',
        provider: 'embedding',
        statusCode: 400,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should give up after the configured attempts on network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(createClient().chat([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'Ollama request to /api/chat failed: fetch failed'
      );
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should abort a reply whose body stalls past the timeout', async () => {
      fetchMock.mockImplementation(async (_url: string, init: RequestInit) => ({
        ok: true,
        json: () =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('body aborted')));
          }),
      }));

      await expect(createClient(20).embed('slow')).rejects.toThrow(
        'Ollama response from /api/embeddings could not be read: body aborted'
      );
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should open the circuit after repeated server failures', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = createClient();

      await expect(client.embed('a')).rejects.toBeInstanceOf(ProviderError);
      await expect(client.embed('b')).rejects.toBeInstanceOf(ProviderError);
      expect(client.getStatus().circuitBreaker.state).toBe('OPEN');

      await expect(client.embed('c')).rejects.toBeInstanceOf(CircuitBreakerOpenError);
      expect(fetchMock).toHaveBeenCalledTimes(6);

      client.reset();
      expect(client.getStatus().circuitBreaker.state).toBe('CLOSED');
    });
  });

  describe('status', () => {
    it('should report endpoint, models and a closed circuit', () => {
      expect(createClient().getStatus()).toEqual({
        baseUrl: BASE_URL,
        chatModel: 'test-chat',
        embeddingModel: 'test-embed',
        circuitBreaker: {
          state: 'CLOSED',
          failureCount: 0,
          lastFailureTime: null,
          timeToRecovery: null,
        },
      });
    });
  });

  describe('providers', () => {
    it('should delegate completion and embedding to the client', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant', content: 'answer' } }))
        .mockResolvedValueOnce(jsonResponse({ embedding: [2, 0] }));
      const client = createClient();

      const text = await new OllamaCompletionProvider(client).complete([
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'q' },
      ]);
      const vec = await new OllamaEmbeddingProvider(client).embed('q');

      expect(text).toBe('answer');
      expect(Array.from(vec)).toEqual([2, 0]);
    });
  });
});
