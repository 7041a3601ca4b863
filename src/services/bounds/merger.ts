/**
 * Bounds Merger
 *
 * Converts located-term rectangles from document points to display pixels
 * and keeps one bound per rounded origin per page: the widest.
 *
 * @module services/bounds/merger
 */

import type {
  LocatedTermsByPage,
  MergedBound,
  MergedBoundsByPage,
  Rect,
} from '../../models/bounds.js';

/** 96 DPI display over 72 points per inch */
export const POINT_TO_PIXEL_RATIO = 96 / 72;

/** Applied as -PADDING to the origin and +PADDING to the extent */
export const BOUNDS_PADDING = 2;

export function toDisplayBounds(rect: Rect): Rect {
  return {
    x: rect.x * POINT_TO_PIXEL_RATIO - BOUNDS_PADDING,
    y: rect.y * POINT_TO_PIXEL_RATIO - BOUNDS_PADDING,
    width: rect.width * POINT_TO_PIXEL_RATIO + BOUNDS_PADDING,
    height: rect.height * POINT_TO_PIXEL_RATIO + BOUNDS_PADDING,
  };
}

function originKey(rect: Rect): string {
  return `${Math.round(rect.x)}:${Math.round(rect.y)}`;
}

/**
 * Deduplicate bounds per page by rounded (x, y). The widest bound of each
 * group is kept; on equal width the first one seen stays. Groups keep the
 * order in which their key first appeared.
 */
export function mergeBounds(pages: MergedBoundsByPage): MergedBoundsByPage {
  const merged: MergedBoundsByPage = new Map();

  for (const [page, bounds] of pages) {
    const byOrigin = new Map<string, MergedBound>();
    for (const bound of bounds) {
      const key = originKey(bound.bounds);
      const current = byOrigin.get(key);
      if (!current || bound.bounds.width > current.bounds.width) {
        byOrigin.set(key, bound);
      }
    }
    merged.set(page, [...byOrigin.values()]);
  }

  return merged;
}

/**
 * Scale every located term to display bounds, then merge.
 */
export function processLocatedTerms(pages: LocatedTermsByPage): MergedBoundsByPage {
  const scaled: MergedBoundsByPage = new Map();
  for (const [page, terms] of pages) {
    scaled.set(
      page,
      terms.map((t) => ({ term: t.term, page, bounds: toDisplayBounds(t.rect) }))
    );
  }
  return mergeBounds(scaled);
}
