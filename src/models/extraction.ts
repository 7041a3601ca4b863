/**
 * Raw text blocks produced by a document extractor.
 *
 * Page blocks carry their 1-indexed page number so chunks can be traced back
 * to pages. A page whose extraction failed is carried with `text: null`.
 */
export type ExtractedBlock =
  | { kind: 'page'; page: number; text: string | null }
  | { kind: 'annotations'; text: string }
  | { kind: 'form_fields'; text: string }
  | { kind: 'text'; text: string };

export const SUPPORTED_MEDIA_TYPE = 'application/pdf';
