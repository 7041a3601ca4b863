/**
 * Embedding errors
 *
 * @module services/embedding/errors
 */

type EmbeddingErrorCode = 'EMBEDDING_FAILED' | 'DIMENSION_MISMATCH';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}
