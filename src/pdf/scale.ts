// src/pdf/scale.ts
// Document space (PDF points, top-left origin) <-> display space (pixels).
// display = document * scale; one scalar for both axes.

import type { FitMode, PdfBBox, PdfPageSize, PdfPoint } from './types.js';

export type ViewportSize = {
  width: number;
  height: number;
};

export type ScaleOptions = {
  naturalScale: number;
  minScale: number;
  // Used while the real viewport has not been laid out yet.
  fallbackViewport: ViewportSize;
};

export const DEFAULT_SCALE_OPTIONS: ScaleOptions = {
  naturalScale: 1.5, // ~108 dpi
  minScale: 0.2,
  fallbackViewport: { width: 1224, height: 1584 },
};

// Below this the viewport is treated as not laid out.
const MIN_VIEWPORT_PX = 50;

function availableArea(viewport: ViewportSize, fallback: ViewportSize): ViewportSize {
  const w = Math.max(MIN_VIEWPORT_PX, Number.isFinite(viewport.width) ? viewport.width : 0);
  const h = Math.max(MIN_VIEWPORT_PX, Number.isFinite(viewport.height) ? viewport.height : 0);
  if (w <= MIN_VIEWPORT_PX || h <= MIN_VIEWPORT_PX) return fallback;
  return { width: w, height: h };
}

export function computeScale(
  page: PdfPageSize,
  fitMode: FitMode,
  viewport: ViewportSize,
  opts: ScaleOptions = DEFAULT_SCALE_OPTIONS
): number {
  let s: number;
  if (fitMode === 'natural') {
    s = opts.naturalScale;
  } else {
    const avail = availableArea(viewport, opts.fallbackViewport);
    s = fitMode === 'fit_width' ? avail.width / page.width : avail.height / page.height;
  }
  if (!Number.isFinite(s)) s = opts.naturalScale;
  return Math.max(opts.minScale, s);
}

export function toDisplayPoint(p: PdfPoint, scale: number): PdfPoint {
  return { x: p.x * scale, y: p.y * scale };
}

export function toDocumentPoint(p: PdfPoint, scale: number): PdfPoint {
  return { x: p.x / scale, y: p.y / scale };
}

export function toDisplayRect(r: PdfBBox, scale: number): PdfBBox {
  return { x0: r.x0 * scale, y0: r.y0 * scale, x1: r.x1 * scale, y1: r.y1 * scale };
}

export function toDocumentRect(r: PdfBBox, scale: number): PdfBBox {
  return { x0: r.x0 / scale, y0: r.y0 / scale, x1: r.x1 / scale, y1: r.y1 / scale };
}
