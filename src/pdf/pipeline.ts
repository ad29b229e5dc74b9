// src/pdf/pipeline.ts
// Entry-point: PDF → fragments → resolved regions.

import type { Fragment, PdfDocLike, RegionResolution } from './types.js';
import type { PdfPageRaw } from './extract.js';
import { extractPdfPages, loadPdfDocument } from './extract.js';
import { buildLines } from './lines.js';
import { buildFragments } from './blocks.js';
import { resolveDocumentRegions } from './regions.js';

export function pageFragments(raw: PdfPageRaw): Fragment[] {
  const lines = buildLines(raw.pageIndex, raw.items, { bodyFontSize: raw.bodyFontSize });
  return buildFragments(raw.pageIndex, lines, { bodyFontSize: raw.bodyFontSize });
}

/** Fragments for every page, in page order. */
export async function extractFragments(pdf: PdfDocLike, opts?: { maxPages?: number }): Promise<Fragment[][]> {
  const pages = await extractPdfPages(pdf, opts);
  return pages.map(pageFragments);
}

export async function parsePdfDocumentToRegions(
  pdf: PdfDocLike,
  opts?: { maxPages?: number }
): Promise<RegionResolution> {
  return resolveDocumentRegions(await extractFragments(pdf, opts));
}

export async function parsePdfToRegions(data: Uint8Array, opts?: { maxPages?: number }): Promise<RegionResolution> {
  const pdf = await loadPdfDocument(data);
  try {
    return await parsePdfDocumentToRegions(pdf, opts);
  } finally {
    await pdf.destroy();
  }
}
