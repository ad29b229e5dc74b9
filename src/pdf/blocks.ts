// src/pdf/blocks.ts
// Group consecutive lines into fragments (paragraph-like blocks).
// Fragment granularity decides how often a marked section spans several
// fragments; the resolver handles either case, so boundaries lean towards splitting.

import type { Fragment, PdfLine } from './types.js';
import { bboxUnionAll, median } from './utils.js';

type FragmentBuildOpts = {
  bodyFontSize: number;
};

function computeMedianLineGap(lines: PdfLine[], fallback: number): number {
  if (lines.length < 2) return fallback;
  const gaps: number[] = [];
  for (let i = 1; i < lines.length; i++) {
    const gap = lines[i].bbox.y0 - lines[i - 1].bbox.y1;
    if (gap > 0) gaps.push(gap);
  }
  gaps.sort((a, b) => a - b);
  return median(gaps) || fallback;
}

function joinFragmentText(lines: PdfLine[]): string {
  return lines.map((l) => l.text).join('\n').trim();
}

export function buildFragments(pageIndex: number, lines: PdfLine[], opts: FragmentBuildOpts): Fragment[] {
  if (!lines.length) return [];

  const body = opts.bodyFontSize > 0 && Number.isFinite(opts.bodyFontSize) ? opts.bodyFontSize : 10;
  const medianGap = computeMedianLineGap(lines, body * 0.3);
  const fragments: Fragment[] = [];

  let current: PdfLine[] = [];

  const flush = () => {
    const rect = bboxUnionAll(current.map((l) => l.bbox));
    const text = joinFragmentText(current);
    current = [];
    if (!rect || !text) return;
    fragments.push({ pageIndex, rect, text });
  };

  for (const ln of lines) {
    if (!current.length) {
      current = [ln];
      continue;
    }

    const prev = current[current.length - 1];
    const gap = ln.bbox.y0 - prev.bbox.y1;

    const newByGap = gap > Math.max(medianGap * 1.25, body * 0.35);
    // Font discontinuity (section headings, entry titles).
    const fontJump = Math.abs(ln.fontSize - prev.fontSize) > Math.max(0.8, body * 0.22);
    // Large left-edge shifts are structural boundaries (list start, hanging indent end).
    const indentShift = Math.abs(ln.bbox.x0 - prev.bbox.x0) > body * 3;

    if (newByGap || fontJump || indentShift) {
      flush();
    }
    current.push(ln);
  }

  flush();

  return fragments;
}
