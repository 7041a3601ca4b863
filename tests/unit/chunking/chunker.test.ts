/**
 * Sentence-Aligned Chunker Tests
 *
 * @module tests/unit/chunking/chunker
 */

import { describe, it, expect } from 'vitest';
import { chunkBlocks, chunkDocument } from '../../../src/services/chunking/chunker.js';
import { ValidationError } from '../../../src/utils/validation.js';

/** 50-character sentence: 48 letters, a period, a space */
const SENTENCE = 'x'.repeat(48) + '. ';

describe('chunkDocument', () => {
  it('cuts a 9000-character document into 3 period-terminated chunks of at most 4000', () => {
    const document = SENTENCE.repeat(180);
    expect(document.length).toBe(9000);

    const chunks = chunkDocument(document, 4000);

    expect(chunks).toHaveLength(3);
    for (const chunk of chunks) {
      expect(chunk.endsWith('.')).toBe(true);
      expect(chunk.length).toBeLessThanOrEqual(4000);
    }
    expect(chunks.map((c) => c.length)).toEqual([3999, 3999, 999]);
  });

  it('defaults to a 4000-character window', () => {
    expect(chunkDocument(SENTENCE.repeat(180))).toHaveLength(3);
  });

  it('returns a document shorter than the window as one trimmed chunk', () => {
    expect(chunkDocument('  Hello world. Bye  ', 4000)).toEqual(['Hello world. Bye']);
  });

  it('hard-cuts fixed-size chunks when there is no period', () => {
    expect(chunkDocument('a'.repeat(25), 10)).toEqual(['a'.repeat(10), 'a'.repeat(10), 'a'.repeat(5)]);
  });

  it('does not cut at a period sitting at the window start', () => {
    expect(chunkDocument('.aaaa.bbbb', 5)).toEqual(['.aaaa', '.bbbb']);
  });

  it('cuts after the last period inside the window', () => {
    expect(chunkDocument('One. Two. Three four five', 16)).toEqual([
      'One. Two.',
      'Three four five',
    ]);
  });

  it('covers the input in order without gaps', () => {
    const document = 'First part here. Second part is longer. Third.';
    const chunks = chunkDocument(document, 25);
    expect(chunks.join(' ')).toBe(document);
  });

  it('never emits empty or whitespace-only chunks', () => {
    const chunks = chunkDocument('Start.' + ' '.repeat(10) + 'End.', 8);
    expect(chunks).toEqual(['Start.', 'End.']);
    expect(chunks.every((c) => c.trim().length > 0)).toBe(true);
  });

  it('returns no chunks for empty or blank text', () => {
    expect(chunkDocument('', 10)).toEqual([]);
    expect(chunkDocument('     ', 2)).toEqual([]);
  });

  it('rejects a non-positive or fractional chunk size', () => {
    expect(() => chunkDocument('abc', 0)).toThrow(ValidationError);
    expect(() => chunkDocument('abc', -5)).toThrow(ValidationError);
    expect(() => chunkDocument('abc', 2.5)).toThrow(ValidationError);
  });
});

describe('chunkBlocks', () => {
  it('labels pages, numbers chunks across blocks and keeps page numbers', () => {
    const chunks = chunkBlocks(
      [
        { kind: 'page', page: 1, text: 'Alpha one. Alpha two.' },
        { kind: 'annotations', text: 'note' },
        { kind: 'page', page: 2, text: null },
        { kind: 'text', text: '   ' },
      ],
      4000
    );

    expect(chunks).toEqual([
      { text: '... Page 1 ...\nAlpha one. Alpha two.', ordinal: 0, page: 1 },
      { text: 'Annotations: note', ordinal: 1, page: null },
      { text: '... Page 2 ...\n[Text extraction failed]', ordinal: 2, page: 2 },
    ]);
  });

  it('splits a long page into several chunks that all carry its page number', () => {
    const chunks = chunkBlocks([{ kind: 'page', page: 7, text: SENTENCE.repeat(4) }], 120);
    expect(chunks.map((c) => c.page)).toEqual([7, 7]);
    expect(chunks.map((c) => c.ordinal)).toEqual([0, 1]);
  });
});
