// src/pdf/utils.ts
// Small, deterministic geometry/statistics helpers used throughout the PDF pipeline.

import type { PdfBBox, PdfPoint } from './types.js';

export function bboxUnion(a: PdfBBox, b: PdfBBox): PdfBBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

export function bboxUnionAll(boxes: PdfBBox[]): PdfBBox | null {
  if (!boxes.length) return null;
  let bb = boxes[0];
  for (let i = 1; i < boxes.length; i++) bb = bboxUnion(bb, boxes[i]);
  return bb;
}

// Edges inclusive.
export function bboxContainsPoint(b: PdfBBox, p: PdfPoint): boolean {
  return p.x >= b.x0 && p.x <= b.x1 && p.y >= b.y0 && p.y <= b.y1;
}

export function bboxWidth(b: PdfBBox): number {
  return Math.max(0, b.x1 - b.x0);
}

export function bboxHeight(b: PdfBBox): number {
  return Math.max(0, b.y1 - b.y0);
}

export function median(sortedAsc: number[]): number {
  if (!sortedAsc.length) return 0;
  const n = sortedAsc.length;
  const mid = Math.floor(n / 2);
  return n % 2 ? sortedAsc[mid] : (sortedAsc[mid - 1] + sortedAsc[mid]) / 2;
}

export function percentile(sortedAsc: number[], p01: number): number {
  if (!sortedAsc.length) return 0;
  const p = Math.max(0, Math.min(1, p01));
  const idx = (sortedAsc.length - 1) * p;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sortedAsc[lo];
  const w = idx - lo;
  return sortedAsc[lo] * (1 - w) + sortedAsc[hi] * w;
}

export function stableSortBy<T>(arr: T[], key: (t: T) => number): T[] {
  return arr
    .map((v, i) => ({ v, i, k: key(v) }))
    .sort((a, b) => (a.k - b.k) || (a.i - b.i))
    .map((o) => o.v);
}
