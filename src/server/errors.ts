/**
 * MCP Server Error Handling
 *
 * Every failure leaving a tool is an MCPError with a category and a recovery
 * hint. Empty-document outcomes are results, not errors.
 *
 * @module server/errors
 */

import { ProviderError } from '../services/providers/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  | 'VALIDATION_ERROR'
  | 'DOCUMENT_NOT_LOADED'
  | 'EMBEDDING_FAILED'
  | 'COMPLETION_FAILED'
  | 'PROVIDER_UNAVAILABLE'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Map error class names to MCPError categories.
 * ProviderError is resolved by its `provider` field in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  EmbeddingError: 'EMBEDDING_FAILED',
  CircuitBreakerOpenError: 'PROVIDER_UNAVAILABLE',
  ConfigurationError: 'CONFIGURATION_ERROR',
};

const PROVIDER_TO_CATEGORY: Record<ProviderError['provider'], ErrorCategory> = {
  embedding: 'EMBEDDING_FAILED',
  completion: 'COMPLETION_FAILED',
  extraction: 'PROVIDER_UNAVAILABLE',
};

function readCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function readDetails(error: Error): Record<string, unknown> | undefined {
  if (!('details' in error)) return undefined;
  const details = error.details;
  if (typeof details !== 'object' || details === null) return undefined;
  return { ...details };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof ProviderError) {
      return new MCPError(PROVIDER_TO_CATEGORY[error.provider], error.message, {
        originalName: error.name,
        provider: error.provider,
        ...(error.statusCode !== undefined && { statusCode: error.statusCode }),
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = readCode(error);
      const details = readDetails(error);
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(details && { errorDetails: details }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next tool and a short hint for agents recovering from an error.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'docqa_document_status',
    hint: 'Check parameter types and required fields',
  },
  DOCUMENT_NOT_LOADED: {
    tool: 'docqa_document_load',
    hint: 'Load a document with docqa_document_load first',
  },
  EMBEDDING_FAILED: {
    tool: 'docqa_provider_status',
    hint: 'Check that OLLAMA_BASE_URL is reachable and DOCQA_EMBED_MODEL is pulled',
  },
  COMPLETION_FAILED: {
    tool: 'docqa_provider_status',
    hint: 'Check that OLLAMA_BASE_URL is reachable and DOCQA_CHAT_MODEL is pulled',
  },
  PROVIDER_UNAVAILABLE: {
    tool: 'docqa_provider_status',
    hint: 'The provider is failing repeatedly; wait for the circuit breaker to recover',
  },
  CONFIGURATION_ERROR: {
    tool: 'docqa_provider_status',
    hint: 'Check OLLAMA_* and DOCQA_* environment variables',
  },
  INTERNAL_ERROR: { tool: 'docqa_document_status', hint: 'Inspect server logs on stderr' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function documentNotLoadedError(): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_LOADED',
    'No document loaded. Use docqa_document_load to load one.'
  );
}
