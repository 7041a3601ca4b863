/**
 * Startup Configuration
 *
 * Validates environment-driven configuration before the transport connects.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { loadOllamaConfig } from '../services/ollama/index.js';
import { configureServer, loadServerConfig } from './state.js';

/**
 * Load and validate server and provider configuration from the environment.
 *
 * @throws ConfigurationError on invalid values
 */
export function applyEnvironmentConfig(): void {
  const serverConfig = loadServerConfig();
  const ollamaConfig = loadOllamaConfig();
  configureServer(serverConfig);

  console.error(
    `[Config] Ollama ${ollamaConfig.baseUrl} chat=${ollamaConfig.chatModel} embed=${ollamaConfig.embeddingModel}`
  );
  console.error(
    `[Config] chunkSize=${serverConfig.chunkSize} topN=${serverConfig.topN} minScore=${serverConfig.minScore} failurePolicy=${serverConfig.failurePolicy}`
  );
}
