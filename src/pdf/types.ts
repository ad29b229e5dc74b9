// src/pdf/types.ts
// Data model for the marker → region pipeline.
// All rects are PDF points with a TOP-LEFT origin (y grows downward). The pdfjs
// adapter converts from PDF user space once, at extraction time.

export type PdfBBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

export type PdfPoint = {
  x: number;
  y: number;
};

export type PdfPageSize = {
  width: number;
  height: number;
};

export type PdfTextItem = {
  pageIndex: number;
  str: string;
  // PDF coordinates (origin bottom-left, from PDF.js transform)
  x: number;
  y: number;
  x2: number;
  y2: number;
  fontSize: number;
  // Top-left origin, PDF points
  bbox: PdfBBox;
  // Raw string carried leading/trailing whitespace (word boundary hint)
  padStart: boolean;
  padEnd: boolean;
};

export type PdfLine = {
  pageIndex: number;
  items: PdfTextItem[];
  text: string;
  bbox: PdfBBox;
  yMid: number;
  fontSize: number;
};

/** One unit of extracted text plus its box on the page. */
export type Fragment = {
  pageIndex: number;
  rect: PdfBBox;
  text: string;
};

export type MarkerKind = 'exp' | 'pr' | 'sk';

export type MarkerBoundary = 'BEGIN' | 'END';

export type Marker = {
  boundary: MarkerBoundary;
  kind: MarkerKind;
  ordinal: number;
  // `<kind>:<digits>` exactly as written, so `exp:01` and `exp:1` stay distinct.
  id: string;
  // Character offset of the token inside the fragment text.
  index: number;
  fragment: Fragment;
};

export type Region = {
  id: string;
  kind: MarkerKind;
  ordinal: number;
  pageIndex: number;
  rect: PdfBBox;
  text: string;
};

/** Resolution order is preserved; ids are unique. */
export type RegionMap = Map<string, Region>;

export type RegionDiagnosticReason =
  | 'unterminated'
  | 'orphan-end'
  | 'duplicate-begin'
  | 'duplicate-region';

export type RegionDiagnostic = {
  reason: RegionDiagnosticReason;
  id: string;
  pageIndex: number;
  fragmentIndex: number;
};

export type RegionResolution = {
  regions: RegionMap;
  diagnostics: RegionDiagnostic[];
};

export type FitMode = 'natural' | 'fit_width' | 'fit_height';

// ---- Minimal PDF.js-like surface types (avoid importing PDF.js types)
// Kept tiny so the pipeline runs on real PDF.js proxies and on test fakes alike.

export type PdfTextItemLike = {
  str?: unknown;
  transform?: unknown;
  width?: unknown;
  height?: unknown;
};

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfViewportLike = {
  width: number;
  height: number;
};

export type PdfRenderParamsLike = {
  canvasContext: unknown;
  viewport: PdfViewportLike;
};

export type PdfPageLike = {
  getViewport(opts: { scale: number }): PdfViewportLike;
  getTextContent(): Promise<PdfTextContentLike>;
  render(params: PdfRenderParamsLike): { promise: Promise<void> };
};

export type PdfDocLike = {
  numPages: number;
  getPage(pageNum: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
};
