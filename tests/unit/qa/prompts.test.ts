import { describe, it, expect } from 'vitest';
import {
  ANSWER_INSTRUCTION,
  buildAnswerSystemPrompt,
  buildSensitiveTermsPrompt,
  parseTermList,
} from '../../../src/services/qa/prompts.js';
import { errorOutcome, renderOutcome } from '../../../src/services/qa/outcome.js';

describe('buildAnswerSystemPrompt', () => {
  it('lists each chunk on its own line after the instruction', () => {
    expect(buildAnswerSystemPrompt(['one', 'two'], 'Answer.')).toBe('Answer. Pages: one\ntwo\n');
  });

  it('defaults to the reference-citing instruction', () => {
    expect(buildAnswerSystemPrompt(['x'])).toBe(`${ANSWER_INSTRUCTION} Pages: x\n`);
    expect(ANSWER_INSTRUCTION).toContain('Reference: [20,21,23]');
  });
});

describe('buildSensitiveTermsPrompt', () => {
  it('puts each non-blank category on its own line', () => {
    const lines = buildSensitiveTermsPrompt(['Names', '  ', 'Emails']).split('\n');
    expect(lines).toHaveLength(5);
    expect(lines.slice(1, 3)).toEqual(['Names', 'Emails']);
    expect(lines[3]).toBe(
      'Please provide the extracted information as a plain list, separated by commas, without any prefix or numbering or extra content.'
    );
    expect(lines[4]).toBe('');
  });
});

describe('parseTermList', () => {
  it('splits on commas and newlines, trims and dedupes case-insensitively', () => {
    expect(parseTermList(' Alice, bob\nALICE ,\n\n Carol ,bob ')).toEqual(['Alice', 'bob', 'Carol']);
  });

  it('returns nothing for blank input', () => {
    expect(parseTermList(' \n , ')).toEqual([]);
  });
});

describe('renderOutcome', () => {
  it('renders errors with the operation label', () => {
    expect(renderOutcome(errorOutcome('quick_summary', new Error('down')))).toBe(
      'Error generating summary: down'
    );
    expect(renderOutcome(errorOutcome('suggestions', 'plain'))).toBe(
      'Error generating suggestions: plain'
    );
  });

  it('passes text through for other outcomes', () => {
    expect(renderOutcome({ status: 'ok', text: 'fine' })).toBe('fine');
    expect(renderOutcome({ status: 'no_content', text: 'none' })).toBe('none');
  });
});
