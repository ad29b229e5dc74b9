// src/pdf/backend.ts
// The three things the region pipeline needs from a document renderer, and the
// PDF.js + @napi-rs/canvas implementation of them.

import { createCanvas } from '@napi-rs/canvas';

import type { Fragment, PdfDocLike, PdfPageSize } from './types.js';
import type { OverlayContext2D } from './overlay.js';
import { extractPdfPage, loadPdfDocument } from './extract.js';
import { pageFragments } from './pipeline.js';

export interface PageRaster {
  width: number;
  height: number;
  context: OverlayContext2D;
  toPng(): Promise<Buffer>;
}

export interface RenderBackend {
  readonly pageCount: number;
  pageSize(pageIndex: number): Promise<PdfPageSize>;
  /** Ordered fragments with non-empty trimmed text. */
  getFragments(pageIndex: number): Promise<Fragment[]>;
  rasterize(pageIndex: number, scale: number): Promise<PageRaster>;
  close(): Promise<void>;
}

export class PdfjsBackend implements RenderBackend {
  private readonly fragmentCache = new Map<number, Fragment[]>();
  private closed = false;

  private constructor(private readonly pdf: PdfDocLike) {}

  static async fromData(data: Uint8Array): Promise<PdfjsBackend> {
    return new PdfjsBackend(await loadPdfDocument(data));
  }

  get pageCount(): number {
    return this.pdf.numPages;
  }

  private assertPage(pageIndex: number): void {
    if (this.closed) throw new Error('Document is closed');
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pdf.numPages) {
      throw new RangeError(`Page ${pageIndex + 1} is out of range (1-${this.pdf.numPages})`);
    }
  }

  async pageSize(pageIndex: number): Promise<PdfPageSize> {
    this.assertPage(pageIndex);
    const page = await this.pdf.getPage(pageIndex + 1);
    const { width, height } = page.getViewport({ scale: 1 });
    return { width, height };
  }

  async getFragments(pageIndex: number): Promise<Fragment[]> {
    this.assertPage(pageIndex);
    const cached = this.fragmentCache.get(pageIndex);
    if (cached) return cached;
    const fragments = pageFragments(await extractPdfPage(this.pdf, pageIndex));
    this.fragmentCache.set(pageIndex, fragments);
    return fragments;
  }

  async rasterize(pageIndex: number, scale: number): Promise<PageRaster> {
    this.assertPage(pageIndex);
    const page = await this.pdf.getPage(pageIndex + 1);
    const viewport = page.getViewport({ scale });
    const width = Math.max(1, Math.ceil(viewport.width));
    const height = Math.max(1, Math.ceil(viewport.height));
    const canvas = createCanvas(width, height);
    const context = canvas.getContext('2d');

    // Opaque white page; PDF.js leaves untouched pixels transparent.
    context.fillStyle = '#ffffff';
    context.fillRect(0, 0, width, height);
    await page.render({ canvasContext: context, viewport }).promise;

    return {
      width,
      height,
      context,
      toPng: () => canvas.encode('png'),
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.fragmentCache.clear();
    await this.pdf.destroy();
  }
}
