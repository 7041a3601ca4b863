/**
 * Provider Health MCP Tools
 *
 * Tools: docqa_provider_status
 *
 * Reports configuration and circuit breaker state. Makes no provider calls.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { z } from 'zod';
import { state } from '../server/state.js';
import { successResult } from '../server/types.js';
import { getSharedClient } from '../services/ollama/index.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

const ProviderStatusInput = z.object({
  reset_circuit_breaker: z
    .boolean()
    .default(false)
    .describe('Close the circuit breaker before reporting'),
});

export async function handleProviderStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProviderStatusInput, params);
    const client = getSharedClient();
    if (input.reset_circuit_breaker) {
      client.reset();
    }

    const status = client.getStatus();
    return formatResponse(
      successResult({
        base_url: status.baseUrl,
        chat_model: status.chatModel,
        embedding_model: status.embeddingModel,
        circuit_breaker: status.circuitBreaker,
        server_config: {
          chunk_size: state.config.chunkSize,
          top_n: state.config.topN,
          min_score: state.config.minScore,
          failure_policy: state.config.failurePolicy,
        },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const healthTools: Record<string, ToolDefinition> = {
  docqa_provider_status: {
    description: 'Show Ollama endpoint, models, circuit breaker state and server settings',
    inputSchema: ProviderStatusInput.shape,
    handler: handleProviderStatus,
  },
};
