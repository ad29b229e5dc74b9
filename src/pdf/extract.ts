// src/pdf/extract.ts
// PDF.js extraction + deterministic conversion into geometric text items.
//
// Coordinates leave this module in PDF points with a top-left origin; nothing
// downstream sees PDF user space (bottom-left origin).

import { createRequire } from 'node:module';
import path from 'node:path';

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { percentile, stableSortBy } from './utils.js';
import type { PdfDocLike, PdfPageLike, PdfTextContentLike, PdfTextItem, PdfTextItemLike } from './types.js';

export type PdfPageRaw = {
  pageIndex: number;
  width: number;
  height: number;
  bodyFontSize: number;
  items: PdfTextItem[];
};

// Share of the glyph height that hangs below the baseline (g, p, y ...).
const DESCENT_RATIO = 0.2;

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

function isTextItemLike(raw: unknown): raw is PdfTextItemLike {
  return typeof raw === 'object' && raw !== null && 'str' in raw;
}

export function parsePageTextItems(pageIndex: number, page: PdfPageLike, content: PdfTextContentLike): PdfPageRaw {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];

  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: PdfTextItem[] = [];
  const fontSizes: number[] = [];

  for (const raw of rawItems) {
    // Marked-content entries carry no `str`.
    if (!isTextItemLike(raw)) continue;
    const s = typeof raw.str === 'string' ? raw.str : '';
    if (!s.trim()) {
      // Whitespace-only items are word separators.
      if (s && parsed.length) parsed[parsed.length - 1].padEnd = true;
      continue;
    }

    const [a, b, c, d, x, y] = parseTransform(raw.transform);

    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), Math.abs(d), 0);
    if (Number.isFinite(fontSize) && fontSize > 0) fontSizes.push(fontSize);

    const w = asNum(raw.width, 0);
    const h = asNum(raw.height, 0) || fontSize;
    const x2 = x + w;
    const y2 = y + h;

    parsed.push({
      pageIndex,
      str: s,
      x,
      y,
      x2,
      y2,
      fontSize,
      bbox: {
        x0: x,
        y0: pageH - y2,
        x1: x2,
        y1: pageH - (y - h * DESCENT_RATIO),
      },
      padStart: /^\s/.test(s),
      padEnd: /\s$/.test(s),
    });
  }

  const sortedFonts = fontSizes.filter((n) => n > 0 && Number.isFinite(n)).sort((p, q) => p - q);
  const bodyFontSize = percentile(sortedFonts, 0.5);

  return {
    pageIndex,
    width: pageW,
    height: pageH,
    bodyFontSize,
    items: stableSortBy(parsed, (p) => (p.bbox.y0 * 10_000) + p.bbox.x0),
  };
}

/**
 * Directory of the standard-14 font files shipped with pdfjs-dist. Without it
 * PDF.js in Node cannot draw glyphs of fonts a PDF references but does not embed.
 * PDF.js joins file names onto it, so it ends with a separator.
 */
export function standardFontDataUrl(): string {
  const require = createRequire(import.meta.url);
  const pkgDir = path.dirname(require.resolve('pdfjs-dist/package.json'));
  return `${path.join(pkgDir, 'standard_fonts')}${path.sep}`;
}

export async function loadPdfDocument(data: Uint8Array): Promise<PdfDocLike> {
  // PDF.js may transfer the buffer to its worker; hand it a private copy.
  const loadingTask = getDocument({
    data: new Uint8Array(data),
    useSystemFonts: true,
    isEvalSupported: false,
    standardFontDataUrl: standardFontDataUrl(),
  });
  const pdf: PdfDocLike = await loadingTask.promise;
  return pdf;
}

export async function extractPdfPage(pdf: PdfDocLike, pageIndex: number): Promise<PdfPageRaw> {
  try {
    const page = await pdf.getPage(pageIndex + 1);
    const content = await page.getTextContent();
    return parsePageTextItems(pageIndex, page, content);
  } catch (err) {
    console.error('[ResumeRegions][extract] failed to extract page', { pageIndex, err });
    // Preserve page indexing: emit empty page.
    return { pageIndex, width: 1, height: 1, bodyFontSize: 0, items: [] };
  }
}

export async function extractPdfPages(pdf: PdfDocLike, opts?: { maxPages?: number }): Promise<PdfPageRaw[]> {
  const maxPages = opts?.maxPages ?? 200;
  const totalPages = Math.min(pdf.numPages, maxPages);

  const out: PdfPageRaw[] = [];
  for (let pageIndex = 0; pageIndex < totalPages; pageIndex++) {
    out.push(await extractPdfPage(pdf, pageIndex));
  }
  return out;
}
