/**
 * Shared helpers for tool handler tests
 *
 * @module tests/unit/tools/helpers
 */

import type { ToolResponse } from '../../../src/tools/shared.js';
import type { FailurePolicy } from '../../../src/services/conversation/session.js';
import type { Message } from '../../../src/models/message.js';
import { DocumentQAService } from '../../../src/services/qa/document-qa-service.js';
import { setService } from '../../../src/server/state.js';
import { RecordingCompletion, VocabularyEmbedder } from '../helpers/fakes.js';

export function parseResponse(response: ToolResponse): {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string };
} {
  return JSON.parse(response.content[0].text);
}

export interface InstalledService {
  service: DocumentQAService;
  embedder: VocabularyEmbedder;
  completion: RecordingCompletion;
}

/**
 * Install a service over in-process providers as the server's service.
 */
export function installService(
  respond?: (messages: Message[], index: number) => string,
  failurePolicy: FailurePolicy = 'empty'
): InstalledService {
  const embedder = new VocabularyEmbedder(['invoice', 'payment', 'weather']);
  const completion = new RecordingCompletion(respond);
  const service = new DocumentQAService({ embedder, completion, failurePolicy });
  setService(service);
  return { service, embedder, completion };
}
