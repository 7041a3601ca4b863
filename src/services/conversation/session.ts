/**
 * ConversationSession - one logical exchange with a completion provider
 *
 * Stateless calls send a fresh [system, user] pair. Stateful calls share one
 * history owned by the session: created lazily with the system message of
 * the first stateful call, then extended by a user message per call and by
 * the assistant reply when that reply is non-empty.
 *
 * Provider failures are converted to results, not thrown, unless the session
 * was created with `failurePolicy: 'throw'`.
 *
 * @module services/conversation/session
 */

import {
  completionFailure,
  completionOk,
  type CompletionResult,
  type Message,
} from '../../models/message.js';
import type { CompletionProvider } from '../providers/types.js';
import { ProviderError } from '../providers/types.js';
import { requireNonBlank } from '../../utils/validation.js';

export const DEFAULT_SYSTEM_MESSAGE = 'You are a helpful assistant';

export const JSON_SYSTEM_MESSAGE =
  "You are a helpful assistant that only returns and replies with valid, iterable RFC8259 compliant JSON in your responses unless I ask for any other format. Do not provide introductory words such as 'Here is your result' or '```json', etc. in the response";

/** What a provider failure becomes at the session boundary */
export type FailurePolicy = 'empty' | 'throw';

export interface CompletionOptions {
  /** Demand strict JSON; overrides `systemRole` */
  returnAsJson?: boolean;
  /** Read from and extend the session history */
  carryHistory?: boolean;
  systemRole?: string;
}

export interface ConversationSessionOptions {
  failurePolicy?: FailurePolicy;
}

/**
 * Resolve the system message for a call.
 */
export function resolveSystemMessage(returnAsJson: boolean, systemRole?: string): string {
  if (returnAsJson) return JSON_SYSTEM_MESSAGE;
  return systemRole && systemRole.length > 0 ? systemRole : DEFAULT_SYSTEM_MESSAGE;
}

export class ConversationSession {
  private history: Message[] | null = null;
  private readonly failurePolicy: FailurePolicy;

  constructor(
    private readonly provider: CompletionProvider,
    options: ConversationSessionOptions = {}
  ) {
    this.failurePolicy = options.failurePolicy ?? 'empty';
  }

  /**
   * Get a completion for `prompt`. Under the 'empty' policy a provider
   * failure is logged and returns ''.
   *
   * @throws ValidationError if prompt is blank
   * @throws ProviderError on provider failure under the 'throw' policy
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const result = await this.completeResult(prompt, options);
    return this.settle(result);
  }

  /**
   * Like `complete`, but reports provider failures as a result instead of
   * applying the failure policy.
   *
   * @throws ValidationError if prompt is blank
   */
  async completeResult(prompt: string, options: CompletionOptions = {}): Promise<CompletionResult> {
    requireNonBlank(prompt, 'Prompt');

    const systemMessage = resolveSystemMessage(options.returnAsJson ?? false, options.systemRole);
    const carryHistory = options.carryHistory ?? false;
    const messages = this.prepareMessages(carryHistory, systemMessage, prompt);

    const result = await this.invoke(messages);
    if (result.status === 'provider_failure') {
      console.error(`[ConversationSession] Completion failed for prompt "${preview(prompt)}": ${result.error}`);
      return result;
    }

    if (carryHistory && result.text.length > 0) {
      this.history?.push({ role: 'assistant', content: result.text });
    }
    return result;
  }

  /**
   * One provider call over caller-owned messages. Session history is not
   * touched. The provider receives a copy, so the caller may mutate its list
   * between calls.
   */
  async exchange(messages: Message[]): Promise<CompletionResult> {
    const result = await this.invoke([...messages]);
    if (result.status === 'provider_failure') {
      console.error(`[ConversationSession] Exchange failed: ${result.error}`);
    }
    return result;
  }

  /**
   * Apply the session's failure policy to a result.
   *
   * @throws ProviderError under the 'throw' policy
   */
  settle(result: CompletionResult): string {
    if (result.status === 'ok') return result.text;
    if (this.failurePolicy === 'throw') {
      throw new ProviderError(result.error, 'completion');
    }
    return '';
  }

  clearHistory(): void {
    this.history = null;
  }

  historyLength(): number {
    return this.history?.length ?? 0;
  }

  isInitialized(): boolean {
    return this.history !== null;
  }

  /** Copy of the stored history, empty when uninitialized */
  getHistory(): Message[] {
    return this.history ? this.history.map((m) => ({ ...m })) : [];
  }

  private prepareMessages(carryHistory: boolean, systemMessage: string, prompt: string): Message[] {
    if (!carryHistory) {
      return [
        { role: 'system', content: systemMessage },
        { role: 'user', content: prompt },
      ];
    }

    this.history ??= [{ role: 'system', content: systemMessage }];
    this.history.push({ role: 'user', content: prompt });
    return [...this.history];
  }

  private async invoke(messages: Message[]): Promise<CompletionResult> {
    try {
      const text = await this.provider.complete(messages);
      return completionOk(text);
    } catch (error) {
      return completionFailure(error instanceof Error ? error.message : String(error));
    }
  }
}

function preview(text: string): string {
  return text.length > 80 ? `${text.slice(0, 80)}...` : text;
}
