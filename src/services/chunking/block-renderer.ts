/**
 * Extracted block rendering
 *
 * Turns extractor output into the labelled text that gets chunked and
 * embedded. Page labels stay in the text so the completion model can cite
 * page numbers.
 *
 * @module services/chunking/block-renderer
 */

import type { ExtractedBlock } from '../../models/extraction.js';

export const FAILED_PAGE_PLACEHOLDER = '[Text extraction failed]';

export function pageLabel(page: number): string {
  return `... Page ${page} ...`;
}

/**
 * Render a single block, or null when there is nothing to index.
 */
export function renderBlock(block: ExtractedBlock): string | null {
  switch (block.kind) {
    case 'page':
      if (block.text === null) {
        return `${pageLabel(block.page)}\n${FAILED_PAGE_PLACEHOLDER}`;
      }
      return block.text.trim().length > 0 ? `${pageLabel(block.page)}\n${block.text}` : null;
    case 'annotations':
      return block.text.trim().length > 0 ? `Annotations: ${block.text}` : null;
    case 'form_fields':
      return block.text.trim().length > 0 ? `Form fields: ${block.text}` : null;
    case 'text':
      return block.text.trim().length > 0 ? block.text : null;
  }
}
