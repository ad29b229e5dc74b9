// src/pdf/hit-test.ts
// Map a display-space pointer position on a page to the region under it.

import type { PdfPoint, Region, RegionMap } from './types.js';
import { toDocumentPoint } from './scale.js';
import { bboxContainsPoint } from './utils.js';

export type CursorKind = 'pointer' | 'default';

/**
 * First region (map order) on `pageIndex` whose rect contains the point.
 * Marked regions are not expected to overlap, so the tie-break rarely matters.
 */
export function hitTestRegion(
  regions: RegionMap,
  pageIndex: number,
  displayPoint: PdfPoint,
  scale: number
): Region | null {
  if (!(scale > 0) || !Number.isFinite(displayPoint.x) || !Number.isFinite(displayPoint.y)) return null;
  const p = toDocumentPoint(displayPoint, scale);
  for (const r of regions.values()) {
    if (r.pageIndex !== pageIndex) continue;
    if (bboxContainsPoint(r.rect, p)) return r;
  }
  return null;
}

export function cursorForPoint(regions: RegionMap, pageIndex: number, displayPoint: PdfPoint, scale: number): CursorKind {
  return hitTestRegion(regions, pageIndex, displayPoint, scale) ? 'pointer' : 'default';
}
