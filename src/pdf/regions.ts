// src/pdf/regions.ts
// Pair BEGIN/END markers across the ordered fragment stream of a page and
// build the union rect + cleaned text for every well-formed pair.
//
// Forward-only: an open region only ever grows, and a closed one is never
// reopened, so each page resolves in a single pass over its fragments.

import type {
  Fragment,
  Marker,
  PdfBBox,
  Region,
  RegionDiagnostic,
  RegionDiagnosticReason,
  RegionMap,
  RegionResolution,
} from './types.js';
import { MARKER_KINDS, markerId, parseRegionId, scanMarkers, stripMarkers } from './markers.js';
import { bboxUnion, stableSortBy } from './utils.js';

type OpenRegion = {
  id: string;
  startIndex: number;
  rect: PdfBBox;
  texts: string[];
};

type ResolverState = {
  regions: RegionMap;
  diagnostics: RegionDiagnostic[];
};

function note(
  state: ResolverState,
  reason: RegionDiagnosticReason,
  id: string,
  pageIndex: number,
  fragmentIndex: number
): void {
  state.diagnostics.push({ reason, id, pageIndex, fragmentIndex });
  if (reason === 'duplicate-begin') {
    console.warn('[ResumeRegions][resolver] duplicate BEGIN ignored; keeping the first', {
      id,
      pageIndex,
      fragmentIndex,
    });
  } else if (reason === 'duplicate-region') {
    console.warn('[ResumeRegions][resolver] region id resolved again; keeping the later pair', {
      id,
      pageIndex,
      fragmentIndex,
    });
  }
}

function emit(
  state: ResolverState,
  id: string,
  pageIndex: number,
  fragmentIndex: number,
  rect: PdfBBox,
  rawText: string
): void {
  const parsed = parseRegionId(id);
  if (!parsed) return;
  // The later pair replaces the earlier one; Map.set keeps the id's first position.
  if (state.regions.has(id)) note(state, 'duplicate-region', id, pageIndex, fragmentIndex);
  const region: Region = {
    id,
    kind: parsed.kind,
    ordinal: parsed.ordinal,
    pageIndex,
    rect: { ...rect },
    text: stripMarkers(rawText),
  };
  state.regions.set(id, region);
}

function idsOf(markers: Marker[], boundary: Marker['boundary']): Set<string> {
  return new Set(markers.filter((m) => m.boundary === boundary).map(markerId));
}

function resolveInto(state: ResolverState, pageIndex: number, fragments: Fragment[]): void {
  const open = new Map<string, OpenRegion>();

  fragments.forEach((frag, i) => {
    const markers = scanMarkers(frag);
    const begins = idsOf(markers, 'BEGIN');
    const ends = idsOf(markers, 'END');

    // Regions already open take this fragment in, and close on a matching END.
    for (const acc of [...open.values()]) {
      acc.rect = bboxUnion(acc.rect, frag.rect);
      acc.texts.push(frag.text);
      if (!ends.has(acc.id)) continue;
      open.delete(acc.id);
      emit(state, acc.id, pageIndex, i, acc.rect, acc.texts.join('\n'));
      ends.delete(acc.id);
      // A BEGIN of the same id in the closing fragment would pair with an END that is already spent.
      if (begins.delete(acc.id)) note(state, 'duplicate-begin', acc.id, pageIndex, i);
    }

    for (const id of begins) {
      if (open.has(id)) {
        note(state, 'duplicate-begin', id, pageIndex, i);
        continue;
      }
      if (ends.has(id)) {
        // Same-fragment pair.
        ends.delete(id);
        emit(state, id, pageIndex, i, frag.rect, frag.text);
        continue;
      }
      open.set(id, { id, startIndex: i, rect: { ...frag.rect }, texts: [frag.text] });
    }

    for (const id of ends) note(state, 'orphan-end', id, pageIndex, i);
  });

  for (const acc of open.values()) note(state, 'unterminated', acc.id, pageIndex, acc.startIndex);
}

/** Resolve one page's fragments (in extraction order). */
export function resolvePageRegions(pageIndex: number, fragments: Fragment[]): RegionResolution {
  const state: ResolverState = { regions: new Map(), diagnostics: [] };
  resolveInto(state, pageIndex, fragments);
  return state;
}

/**
 * Resolve every page of a document. Ids are unique document-wide; pairs never
 * span pages (a BEGIN left open at the end of its page is dropped).
 */
export function resolveDocumentRegions(pages: Fragment[][]): RegionResolution {
  const state: ResolverState = { regions: new Map(), diagnostics: [] };
  pages.forEach((fragments, pageIndex) => resolveInto(state, pageIndex, fragments));
  return state;
}

export function regionsOnPage(regions: RegionMap, pageIndex: number): Region[] {
  return [...regions.values()].filter((r) => r.pageIndex === pageIndex);
}

/** One line per region, ordered by kind then ordinal. */
export function summarizeRegions(regions: RegionMap): string[] {
  const kindRank = (r: Region) => MARKER_KINDS.indexOf(r.kind);
  const sorted = stableSortBy([...regions.values()], (r) => r.ordinal);
  return stableSortBy(sorted, kindRank).map((r) => {
    const { x0, y0, x1, y1 } = r.rect;
    const rect = [x0, y0, x1, y1].map((n) => n.toFixed(1)).join(',');
    return `${r.id.padStart(6)}  page=${r.pageIndex + 1}  rect=(${rect})  text_len=${r.text.length}`;
  });
}
