/**
 * Chat message model shared by the conversation session, the summarizer and
 * the completion providers.
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
}

/**
 * Outcome of a single completion exchange.
 *
 * Provider failures are carried as data so the session boundary can decide
 * whether to degrade to an empty answer or rethrow.
 */
export type CompletionResult =
  | { status: 'ok'; text: string }
  | { status: 'provider_failure'; text: ''; error: string };

export function completionOk(text: string): CompletionResult {
  return { status: 'ok', text };
}

export function completionFailure(error: string): CompletionResult {
  return { status: 'provider_failure', text: '', error };
}
