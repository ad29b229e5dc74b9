// src/region-session.ts
// One loaded document and the viewer state around it: current page, fit mode,
// viewport, resolved regions. The region map is rebuilt on every load and the
// renderer handle is released on replace, close and failed load.

import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import type { PdfPoint, Region, RegionDiagnostic, RegionMap, FitMode, Fragment } from './pdf/types.js';
import type { PageRaster, RenderBackend } from './pdf/backend.js';
import { PdfjsBackend } from './pdf/backend.js';
import { resolveDocumentRegions } from './pdf/regions.js';
import { computeScale, type ScaleOptions, type ViewportSize } from './pdf/scale.js';
import { cursorForPoint, hitTestRegion, type CursorKind } from './pdf/hit-test.js';
import { debugOverlayStyle, renderOverlayPage, screenOverlayStyle } from './pdf/overlay.js';
import { defaultExportPath, writeFileAtomic, writeRegionExport } from './pdf/export.js';
import { DocumentLoadError, describeError } from './errors.js';
import { DEFAULT_SETTINGS, type RegionSettings } from './types.js';

export type BackendFactory = (data: Uint8Array) => Promise<RenderBackend>;

export type RegionSessionOptions = {
  settings?: RegionSettings;
  openBackend?: BackendFactory;
  /** Receives the text of a clicked region */
  copyToClipboard?: (text: string) => void;
};

type LoadedDocument = {
  path: string;
  backend: RenderBackend;
  regions: RegionMap;
  diagnostics: RegionDiagnostic[];
};

export const NO_REGIONS_NOTICE = 'No regions found. Make sure [BEGIN ...]/[END ...] markers exist.';

export function defaultDebugPngPath(pdfPath: string, pageIndex: number): string {
  return path.join(path.dirname(pdfPath), `debug_overlay_page${pageIndex + 1}.png`);
}

export class RegionSession {
  private doc: LoadedDocument | null = null;
  private pageIndex = 0;
  private fitMode: FitMode;
  private viewport: ViewportSize = { width: 0, height: 0 };
  private readonly settings: RegionSettings;
  private readonly openBackend: BackendFactory;
  private readonly copyToClipboard: (text: string) => void;

  constructor(options: RegionSessionOptions = {}) {
    this.settings = options.settings ?? { ...DEFAULT_SETTINGS };
    this.fitMode = this.settings.fitMode;
    this.openBackend = options.openBackend ?? ((data) => PdfjsBackend.fromData(data));
    this.copyToClipboard = options.copyToClipboard ?? (() => {});
  }

  get isOpen(): boolean {
    return this.doc !== null;
  }

  get path(): string | null {
    return this.doc?.path ?? null;
  }

  get regions(): RegionMap {
    return this.doc?.regions ?? new Map();
  }

  get diagnostics(): RegionDiagnostic[] {
    return this.doc?.diagnostics ?? [];
  }

  get currentPage(): number {
    return this.pageIndex;
  }

  get pageCount(): number {
    return this.doc?.backend.pageCount ?? 0;
  }

  get currentFitMode(): FitMode {
    return this.fitMode;
  }

  private requireDoc(): LoadedDocument {
    if (!this.doc) throw new Error('No document is open');
    return this.doc;
  }

  private scaleOptions(): ScaleOptions {
    return {
      naturalScale: this.settings.naturalScale,
      minScale: this.settings.minScale,
      fallbackViewport: {
        width: this.settings.fallbackViewportWidth,
        height: this.settings.fallbackViewportHeight,
      },
    };
  }

  /**
   * Load a PDF and resolve its regions, replacing any open document.
   * Missing or unreadable input throws DocumentLoadError.
   */
  async open(pdfPath: string): Promise<RegionMap> {
    await this.close();

    let data: Uint8Array;
    try {
      data = await readFile(pdfPath);
    } catch (err) {
      throw new DocumentLoadError(pdfPath, `PDF not found or unreadable: ${pdfPath} (${describeError(err)})`, { cause: err });
    }

    let backend: RenderBackend | null = null;
    try {
      backend = await this.openBackend(data);
      const pages: Fragment[][] = [];
      const pageCount = Math.min(backend.pageCount, this.settings.maxPages);
      for (let i = 0; i < pageCount; i++) pages.push(await backend.getFragments(i));
      const { regions, diagnostics } = resolveDocumentRegions(pages);

      this.doc = { path: pdfPath, backend, regions, diagnostics };
      this.pageIndex = 0;
      if (!regions.size) console.info(`[ResumeRegions][session] ${NO_REGIONS_NOTICE}`, { path: pdfPath });
      return regions;
    } catch (err) {
      if (backend) await backend.close();
      throw new DocumentLoadError(pdfPath, `Failed to open PDF: ${pdfPath} (${describeError(err)})`, { cause: err });
    }
  }

  async close(): Promise<void> {
    const doc = this.doc;
    this.doc = null;
    this.pageIndex = 0;
    if (doc) await doc.backend.close();
  }

  nextPage(): boolean {
    if (this.pageIndex >= this.pageCount - 1) return false;
    this.pageIndex += 1;
    return true;
  }

  prevPage(): boolean {
    if (this.pageIndex <= 0) return false;
    this.pageIndex -= 1;
    return true;
  }

  goToPage(pageIndex: number): void {
    const doc = this.requireDoc();
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= doc.backend.pageCount) {
      throw new RangeError(`Page ${pageIndex + 1} is out of range (1-${doc.backend.pageCount})`);
    }
    this.pageIndex = pageIndex;
  }

  setFitMode(mode: FitMode): void {
    this.fitMode = mode;
  }

  /** Display area available to the page, e.g. after a window resize. */
  resize(viewport: ViewportSize): void {
    this.viewport = { ...viewport };
  }

  async scale(): Promise<number> {
    const doc = this.requireDoc();
    const size = await doc.backend.pageSize(this.pageIndex);
    return computeScale(size, this.fitMode, this.viewport, this.scaleOptions());
  }

  /** Current page at the current scale with screen-style overlays. */
  async renderPage(): Promise<PageRaster> {
    const doc = this.requireDoc();
    const s = await this.scale();
    const style = screenOverlayStyle(s, {
      strokeColor: this.settings.screenStrokeColor,
      fillColor: this.settings.screenFillColor,
      fillAlpha: this.settings.screenFillAlpha,
    });
    return renderOverlayPage(doc.backend, doc.regions, this.pageIndex, s, style);
  }

  async hitTest(displayPoint: PdfPoint): Promise<Region | null> {
    const doc = this.requireDoc();
    return hitTestRegion(doc.regions, this.pageIndex, displayPoint, await this.scale());
  }

  async hover(displayPoint: PdfPoint): Promise<CursorKind> {
    if (!this.doc) return 'default';
    return cursorForPoint(this.doc.regions, this.pageIndex, displayPoint, await this.scale());
  }

  /** Copy-on-click: the hit region's text goes to the clipboard sink. */
  async click(displayPoint: PdfPoint): Promise<Region | null> {
    const hit = await this.hitTest(displayPoint);
    if (hit) this.copyToClipboard(hit.text);
    return hit;
  }

  async exportRegions(outPath?: string): Promise<string> {
    const doc = this.requireDoc();
    return writeRegionExport(doc.regions, outPath ?? defaultExportPath(doc.path));
  }

  async exportDebugPng(pageIndex = this.pageIndex, zoom = this.settings.debugZoom, outPath?: string): Promise<string> {
    const doc = this.requireDoc();
    const style = debugOverlayStyle(zoom, this.settings.debugStrokeColor);
    const raster = await renderOverlayPage(doc.backend, doc.regions, pageIndex, zoom, style);
    const out = outPath ?? defaultDebugPngPath(doc.path, pageIndex);
    await mkdir(path.dirname(out), { recursive: true });
    await writeFileAtomic(out, await raster.toPng());
    return out;
  }
}
