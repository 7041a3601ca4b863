import { describe, it, expect } from 'vitest';
import {
  FAILED_PAGE_PLACEHOLDER,
  pageLabel,
  renderBlock,
} from '../../../src/services/chunking/block-renderer.js';

describe('renderBlock', () => {
  it('prefixes page text with its page label', () => {
    expect(renderBlock({ kind: 'page', page: 3, text: 'Body text.' })).toBe(
      '... Page 3 ...\nBody text.'
    );
  });

  it('keeps failed pages with a placeholder', () => {
    expect(renderBlock({ kind: 'page', page: 2, text: null })).toBe(
      `${pageLabel(2)}\n${FAILED_PAGE_PLACEHOLDER}`
    );
  });

  it('labels annotations and form fields', () => {
    expect(renderBlock({ kind: 'annotations', text: 'Sign here' })).toBe('Annotations: Sign here');
    expect(renderBlock({ kind: 'form_fields', text: 'Name=Jo' })).toBe('Form fields: Name=Jo');
  });

  it('passes plain text through unchanged', () => {
    expect(renderBlock({ kind: 'text', text: ' as is ' })).toBe(' as is ');
  });

  it('drops blocks with only whitespace', () => {
    expect(renderBlock({ kind: 'page', page: 1, text: '  \n ' })).toBeNull();
    expect(renderBlock({ kind: 'annotations', text: '' })).toBeNull();
    expect(renderBlock({ kind: 'form_fields', text: '\t' })).toBeNull();
    expect(renderBlock({ kind: 'text', text: ' ' })).toBeNull();
  });
});
