/**
 * Located-text geometry
 *
 * LocatedTerm coordinates are in document points as reported by the
 * extractor's text search. MergedBound coordinates are display pixels.
 */

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Raw occurrence of a sensitive term on a page
 */
export interface LocatedTerm {
  term: string;
  /** Page number as keyed by the extractor */
  page: number;
  rect: Rect;
}

/**
 * Deduplicated, pixel-scaled bound for a located term.
 * At most one per rounded (x, y) per page: the widest.
 */
export interface MergedBound {
  term: string;
  page: number;
  bounds: Rect;
}

/** page -> located terms */
export type LocatedTermsByPage = Map<number, LocatedTerm[]>;

/** page -> merged bounds */
export type MergedBoundsByPage = Map<number, MergedBound[]>;
