/**
 * Fixed prompts and user-visible sentinel strings for document Q&A
 *
 * @module services/qa/prompts
 */

export const ANSWER_INSTRUCTION =
  'You are a helpful assistant. Use the provided PDF document pages and pick a precise page to answer the user question, provide a reference at the bottom of the content with page numbers like ex: Reference: [20,21,23].';

export const SUGGESTIONS_PROMPT =
  'You are a helpful assistant. Your task is to analyze the provided text and generate 3 short diverse questions and each question should not exceed 10 words';

export const QUICK_SUMMARY_PROMPT =
  'You are a helpful assistant. Your task is to analyze the provided text and generate a concise summary.';

export const NO_RELEVANT_CONTENT = 'No relevant content found to answer your question.';
export const NO_CONTENT_AVAILABLE = 'No content available for analysis.';
export const NO_QUICK_SUMMARY = 'No summary generated.';

/** Number of leading chunks sent as context for whole-document prompts */
export const CONTEXT_CHUNK_LIMIT = 10;

/**
 * System prompt for answering: the instruction followed by the retrieved
 * chunks, one per line.
 */
export function buildAnswerSystemPrompt(
  chunks: string[],
  instruction: string = ANSWER_INSTRUCTION
): string {
  const pages = chunks.map((c) => `${c}\n`).join('');
  return `${instruction} Pages: ${pages}`;
}

/**
 * PII extraction prompt enumerating the requested categories, one per line.
 */
export function buildSensitiveTermsPrompt(categories: string[]): string {
  const lines = [
    'I have a block of text containing various pieces of information. Please help me identify and extract any Personally Identifiable Information (PII) present in the text. The PII categories I am interested in are:',
    ...categories.filter((c) => c.trim().length > 0),
    'Please provide the extracted information as a plain list, separated by commas, without any prefix or numbering or extra content.',
  ];
  return lines.map((l) => `${l}\n`).join('');
}

/**
 * Split a free-text model answer on newlines and commas, trim, drop blanks
 * and dedupe case-insensitively. The first spelling seen is kept.
 */
export function parseTermList(answer: string): string[] {
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const raw of answer.trim().split(/[\n,]/)) {
    const term = raw.trim();
    if (term.length === 0) continue;
    const key = term.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    terms.push(term);
  }
  return terms;
}
