/**
 * Q&A operation outcomes
 *
 * Operations report what happened as data. The plain-string methods of the
 * service render an outcome with `renderOutcome`, which is the only place
 * the "Error <doing X>: <message>" text is produced.
 *
 * @module services/qa/outcome
 */

export type QAOperation = 'answer' | 'suggestions' | 'quick_summary';

export type QAOutcome =
  /** The operation ran; text may be empty when the provider returned nothing */
  | { status: 'ok'; text: string }
  /** Nothing loaded or nothing relevant; text is the fixed sentinel */
  | { status: 'no_content'; text: string }
  | { status: 'error'; operation: QAOperation; message: string };

const OPERATION_LABELS: Record<QAOperation, string> = {
  answer: 'getting answer',
  suggestions: 'generating suggestions',
  quick_summary: 'generating summary',
};

export function renderOutcome(outcome: QAOutcome): string {
  if (outcome.status === 'error') {
    return `Error ${OPERATION_LABELS[outcome.operation]}: ${outcome.message}`;
  }
  return outcome.text;
}

export function errorOutcome(operation: QAOperation, error: unknown): QAOutcome {
  return {
    status: 'error',
    operation,
    message: error instanceof Error ? error.message : String(error),
  };
}
