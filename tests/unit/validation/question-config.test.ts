/**
 * Question configuration validation tests
 */

import { describe, it, expect } from 'vitest';
import {
  QuestionConfigSchema,
  ValidationError,
  isValidPageRange,
  requireNonBlank,
  validateInput,
} from '../../../src/utils/validation.js';
import {
  getEffectiveChunkSize,
  getEffectiveQuestionTextForEmbedding,
  getEffectiveTopN,
  getPageRange,
} from '../../../src/models/question.js';

describe('isValidPageRange', () => {
  it.each([undefined, null, '', '  ', '4', ' 12 ', '2-7', '3 - 3'])('accepts %j', (range) => {
    expect(isValidPageRange(range)).toBe(true);
  });

  it.each(['0', '7-2', '0-3', 'a', '1-', '-4', '1-2-3', '1,2'])('rejects %j', (range) => {
    expect(isValidPageRange(range)).toBe(false);
  });
});

describe('QuestionConfigSchema', () => {
  it('trims the question text', () => {
    const config = validateInput(QuestionConfigSchema, { questionText: '  What is due?  ' });
    expect(config.questionText).toBe('What is due?');
  });

  it('rejects a blank question', () => {
    expect(() => validateInput(QuestionConfigSchema, { questionText: '   ' })).toThrow(
      'questionText: Question text is required'
    );
  });

  it('rejects out-of-range chunk size and topN', () => {
    expect(() =>
      validateInput(QuestionConfigSchema, { questionText: 'q', chunkSize: 50 })
    ).toThrow('chunkSize: ChunkSize must be between 100 and 10000');
    expect(() => validateInput(QuestionConfigSchema, { questionText: 'q', topN: 21 })).toThrow(
      'topN: TopN must be between 1 and 20'
    );
  });

  it('rejects a malformed page range', () => {
    expect(() =>
      validateInput(QuestionConfigSchema, { questionText: 'q', pageRange: '9-1' })
    ).toThrow(ValidationError);
  });

  it('joins every failed path into one message', () => {
    expect(() =>
      validateInput(QuestionConfigSchema, { questionText: '', topN: 0 })
    ).toThrow('questionText: Question text is required; topN: TopN must be between 1 and 20');
  });
});

describe('requireNonBlank', () => {
  it('returns the value when present', () => {
    expect(requireNonBlank(' x ', 'Prompt')).toBe(' x ');
  });

  it.each([null, undefined, '', ' \n '])('rejects %j', (value) => {
    expect(() => requireNonBlank(value, 'Prompt')).toThrow('Prompt cannot be null or whitespace.');
  });
});

describe('question helpers', () => {
  it('parses page ranges into inclusive bounds', () => {
    expect(getPageRange({ pageRange: '2-4' })).toEqual({ start: 2, end: 4 });
    expect(getPageRange({ pageRange: ' 5 ' })).toEqual({ start: 5, end: 5 });
    expect(getPageRange({ pageRange: undefined })).toBeNull();
    expect(getPageRange({ pageRange: 'x-y' })).toBeNull();
  });

  it('keeps very wide ranges as bounds', () => {
    expect(isValidPageRange('1-300000000')).toBe(true);
    expect(getPageRange({ pageRange: '1-300000000' })).toEqual({ start: 1, end: 300000000 });
  });

  it('falls back to the question text for embedding', () => {
    expect(getEffectiveQuestionTextForEmbedding({ questionText: 'q' })).toBe('q');
    expect(
      getEffectiveQuestionTextForEmbedding({ questionText: 'q', questionTextForEmbedding: '  ' })
    ).toBe('q');
    expect(
      getEffectiveQuestionTextForEmbedding({ questionText: 'q', questionTextForEmbedding: 'alt' })
    ).toBe('alt');
  });

  it('resolves chunk size and topN defaults', () => {
    expect(getEffectiveChunkSize({ questionText: 'q' })).toBe(4000);
    expect(getEffectiveChunkSize({ questionText: 'q', chunkSize: 800 }, 2000)).toBe(800);
    expect(getEffectiveTopN({ questionText: 'q' })).toBe(5);
    expect(getEffectiveTopN({ questionText: 'q' }, 3)).toBe(3);
  });
});
