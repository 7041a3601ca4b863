/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { FailurePolicy } from '../services/conversation/session.js';
import type { DocumentQAService } from '../services/qa/document-qa-service.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerConfig {
  /** Default chunk size in characters (default: 4000) */
  chunkSize: number;

  /** Chunks retrieved per question (default: 5) */
  topN: number;

  /** Minimum cosine similarity for a chunk to be used as context (default: 0.5) */
  minScore: number;

  /** What a completion failure becomes (default: 'empty') */
  failurePolicy: FailurePolicy;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  /** Q&A service, created on first use */
  service: DocumentQAService | null;

  config: ServerConfig;
}
