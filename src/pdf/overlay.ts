// src/pdf/overlay.ts
// Draw resolved regions over a rasterized page.
// One draw step, two sinks: the debug PNG and an on-screen canvas both hand in
// a 2D context; nothing here knows which one it is drawing into.

import type { Region, RegionMap } from './types.js';
import type { PageRaster, RenderBackend } from './backend.js';
import { regionsOnPage } from './regions.js';
import { toDisplayRect } from './scale.js';
import { bboxHeight, bboxWidth } from './utils.js';

/** The slice of CanvasRenderingContext2D the overlay needs. */
export interface OverlayContext2D {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
}

export type OverlayStyle = {
  stroke: string;
  // null: outline only
  fill: string | null;
  lineWidth: number;
};

export type OverlayColors = {
  strokeColor: string;
  fillColor: string;
  fillAlpha: number;
};

export function hexToRgba(hex: string, alpha: number): string {
  let h = hex.replace(/^#/, '');
  if (h.length === 3) h = h.split('').map((c) => c + c).join('');
  const n = Number.parseInt(h, 16);
  const r = (n >> 16) & 0xff;
  const g = (n >> 8) & 0xff;
  const b = n & 0xff;
  const a = Math.max(0, Math.min(1, alpha));
  return `rgba(${r}, ${g}, ${b}, ${Number(a.toFixed(3))})`;
}

// Interactive view: dark border that thickens with zoom, light tint.
export function screenOverlayStyle(scale: number, colors: OverlayColors): OverlayStyle {
  return {
    stroke: colors.strokeColor,
    fill: hexToRgba(colors.fillColor, colors.fillAlpha),
    lineWidth: Math.max(1, Math.floor(2 * scale)),
  };
}

// Debug image: 1pt outline, no fill.
export function debugOverlayStyle(scale: number, strokeColor: string): OverlayStyle {
  return { stroke: strokeColor, fill: null, lineWidth: scale };
}

export function drawRegionOverlays(
  ctx: OverlayContext2D,
  regions: RegionMap | Region[],
  pageIndex: number,
  scale: number,
  style: OverlayStyle
): number {
  const onPage = Array.isArray(regions)
    ? regions.filter((r) => r.pageIndex === pageIndex)
    : regionsOnPage(regions, pageIndex);

  ctx.strokeStyle = style.stroke;
  ctx.lineWidth = style.lineWidth;
  if (style.fill) ctx.fillStyle = style.fill;

  for (const r of onPage) {
    const d = toDisplayRect(r.rect, scale);
    const w = bboxWidth(d);
    const h = bboxHeight(d);
    if (style.fill) ctx.fillRect(d.x0, d.y0, w, h);
    ctx.strokeRect(d.x0, d.y0, w, h);
  }
  return onPage.length;
}

export async function renderOverlayPage(
  backend: RenderBackend,
  regions: RegionMap,
  pageIndex: number,
  scale: number,
  style: OverlayStyle
): Promise<PageRaster> {
  const raster = await backend.rasterize(pageIndex, scale);
  drawRegionOverlays(raster.context, regions, pageIndex, scale, style);
  return raster;
}
