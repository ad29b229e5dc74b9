// src/pdf/lines.ts
// Convert raw text items into ordered lines.

import type { PdfLine, PdfTextItem } from './types.js';
import { bboxUnionAll, median, stableSortBy } from './utils.js';

type LineBuilderOpts = {
  bodyFontSize: number;
};

// ---- Line-building parameter estimates (structural-only, proportional to font size)

export function estimateSpaceThreshold(bodyFontSize: number): number {
  // Insert a space between adjacent text items when their x-gap exceeds this.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 2.5;
  return Math.min(10, Math.max(1.5, bodyFontSize * 0.2));
}

export function estimateLineYTolerance(bodyFontSize: number): number {
  // Items whose vertical midpoints are within this distance share a line.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 3.5;
  return Math.min(12, Math.max(2.0, bodyFontSize * 0.45));
}

function mergeLineText(itemsSortedX: PdfTextItem[], spacePt: number): string {
  let out = '';
  let prevX2 = Number.NEGATIVE_INFINITY;
  let prevPadEnd = false;

  for (const it of itemsSortedX) {
    const s = it.str.replace(/\s+/g, ' ').trim();
    if (!s) continue;

    const gap = it.x - prevX2;
    const needSpace = out.length > 0 && (prevPadEnd || it.padStart || gap > spacePt);
    if (needSpace) out += ' ';
    out += s;
    prevX2 = Math.max(prevX2, it.x2);
    prevPadEnd = it.padEnd;
  }

  return out.trim();
}

export function buildLines(pageIndex: number, items: PdfTextItem[], opts: LineBuilderOpts): PdfLine[] {
  if (!items.length) return [];

  const yTol = estimateLineYTolerance(opts.bodyFontSize);
  const spacePt = estimateSpaceThreshold(opts.bodyFontSize);

  // Sort by top edge, then x.
  const sorted = stableSortBy(items, (it) => (it.bbox.y0 * 10_000) + it.bbox.x0);

  type LineAcc = {
    items: PdfTextItem[];
    yMid: number;
    fontSizes: number[];
  };

  const lines: LineAcc[] = [];

  for (const it of sorted) {
    const yMid = (it.bbox.y0 + it.bbox.y1) / 2;

    // Deterministic placement: first matching line by insertion order.
    const ln = lines.find((l) => Math.abs(l.yMid - yMid) <= yTol);
    if (ln) {
      ln.items.push(it);
      ln.fontSizes.push(it.fontSize);
      ln.yMid = (ln.yMid + yMid) / 2;
    } else {
      lines.push({ items: [it], yMid, fontSizes: [it.fontSize] });
    }
  }

  const out: PdfLine[] = [];
  for (const ln of lines) {
    const itemsX = stableSortBy(ln.items, (it) => it.bbox.x0);
    const text = mergeLineText(itemsX, spacePt);
    const bbox = bboxUnionAll(itemsX.map((it) => it.bbox));
    if (!text || !bbox) continue;

    const fonts = ln.fontSizes.filter((n) => Number.isFinite(n) && n > 0).sort((a, b) => a - b);

    out.push({
      pageIndex,
      items: itemsX,
      text,
      bbox,
      yMid: ln.yMid,
      fontSize: fonts.length ? median(fonts) : 0,
    });
  }

  // Order lines top-to-bottom.
  return out.sort((a, b) => a.yMid - b.yMid || a.bbox.x0 - b.bbox.x0);
}
