/**
 * Ollama providers
 * Exports the client, provider adapters and configuration
 */

// Client
export {
  OllamaClient,
  OllamaCompletionProvider,
  OllamaEmbeddingProvider,
  getSharedClient,
  resetSharedClient,
  type OllamaClientStatus,
} from './client.js';

// Configuration
export {
  ConfigurationError,
  OllamaConfigSchema,
  OLLAMA_DEFAULT_MODELS,
  loadOllamaConfig,
  type OllamaConfig,
  type OllamaConfigInput,
} from './config.js';

// Circuit Breaker
export { CircuitBreaker, CircuitBreakerOpenError, CircuitState } from './circuit-breaker.js';
