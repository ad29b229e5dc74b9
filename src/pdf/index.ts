// src/pdf/index.ts
// Public entrypoints for the marker → region pipeline.

export type {
  FitMode,
  Fragment,
  Marker,
  MarkerBoundary,
  MarkerKind,
  PdfBBox,
  PdfDocLike,
  PdfPageLike,
  PdfPageSize,
  PdfPoint,
  Region,
  RegionDiagnostic,
  RegionDiagnosticReason,
  RegionMap,
  RegionResolution,
} from './types.js';

export { extractFragments, pageFragments, parsePdfDocumentToRegions, parsePdfToRegions } from './pipeline.js';
export { loadPdfDocument } from './extract.js';

export { MARKER_KINDS, makeRegionId, parseRegionId, scanMarkers, stripMarkers } from './markers.js';
export { regionsOnPage, resolveDocumentRegions, resolvePageRegions, summarizeRegions } from './regions.js';

// Display mapping, hit testing and overlays.
export { computeScale, DEFAULT_SCALE_OPTIONS, toDisplayPoint, toDisplayRect, toDocumentPoint, toDocumentRect } from './scale.js';
export type { ScaleOptions, ViewportSize } from './scale.js';
export { cursorForPoint, hitTestRegion } from './hit-test.js';
export type { CursorKind } from './hit-test.js';
export { debugOverlayStyle, drawRegionOverlays, renderOverlayPage, screenOverlayStyle } from './overlay.js';
export type { OverlayContext2D, OverlayStyle } from './overlay.js';

export { defaultExportPath, parseRegionExport, regionsToJson, serializeRegions, writeRegionExport } from './export.js';
export type { RegionExport, RegionExportEntry } from './export.js';

export { PdfjsBackend } from './backend.js';
export type { PageRaster, RenderBackend } from './backend.js';
