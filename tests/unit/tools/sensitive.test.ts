/**
 * Tests for Sensitive Data MCP Tools
 *
 * @module tests/unit/tools/sensitive
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { handleMergeBounds, handleSensitiveTerms } from '../../../src/tools/sensitive.js';
import { resetState } from '../../../src/server/state.js';
import { installService, parseResponse } from './helpers.js';

describe('Sensitive Data Tools', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    resetState();
  });

  describe('docqa_sensitive_terms', () => {
    it('should return the parsed term list', async () => {
      const { service } = installService(() => 'Jo Smith, 555-0100, JO SMITH');
      await service.loadDocument('Contact Jo Smith at 555-0100.');

      const result = parseResponse(
        await handleSensitiveTerms({ text: 'scan', categories: ['Names', 'Phone numbers'] })
      );

      expect(result.data).toEqual({ count: 2, terms: ['Jo Smith', '555-0100'] });
    });

    it('should require at least one category', async () => {
      installService();
      const result = parseResponse(await handleSensitiveTerms({ text: 'scan', categories: [] }));
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('docqa_merge_bounds', () => {
    it('should scale, merge and sort bounds by page', async () => {
      const result = parseResponse(
        await handleMergeBounds({
          located_terms: [
            { term: 'Ann', page: 2, rect: { x: 72, y: 72, width: 18, height: 9 } },
            { term: 'Ann Lee', page: 2, rect: { x: 72, y: 72, width: 36, height: 9 } },
            { term: 'Bo', page: 1, rect: { x: 0, y: 36, width: 36, height: 9 } },
          ],
        })
      );

      expect(result.data).toEqual({
        input_count: 3,
        merged_count: 2,
        pages: [
          { page: 1, bounds: [{ term: 'Bo', x: -2, y: 46, width: 50, height: 14 }] },
          { page: 2, bounds: [{ term: 'Ann Lee', x: 94, y: 94, width: 50, height: 14 }] },
        ],
      });
    });

    it('should reject negative widths', async () => {
      const result = parseResponse(
        await handleMergeBounds({
          located_terms: [{ term: 'x', page: 1, rect: { x: 0, y: 0, width: -1, height: 1 } }],
        })
      );
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });
});
