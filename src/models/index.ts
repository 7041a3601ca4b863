/**
 * Document Q&A - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Chunk models
export * from './chunk.js';

// Embedding models
export * from './embedding.js';

// Conversation models
export * from './message.js';

// Geometry models
export * from './bounds.js';

// Extraction models
export * from './extraction.js';

// Question models
export * from './question.js';
