// src/pdf/markers.ts
// Marker grammar: `[BEGIN <kind>:<ordinal>]` / `[END <kind>:<ordinal>]`.
// The grammar lives here only; the resolver never touches raw token text.

import type { Fragment, Marker, MarkerBoundary, MarkerKind } from './types.js';

export const MARKER_KINDS: readonly MarkerKind[] = ['exp', 'pr', 'sk'];

const MARKER_SOURCE = String.raw`\[(BEGIN|END)\s+(exp|pr|sk):(\d+)\]`;

// Fresh RegExp per call: global regexes carry `lastIndex` state.
function markerRegExp(): RegExp {
  return new RegExp(MARKER_SOURCE, 'g');
}

function isBoundary(s: string): s is MarkerBoundary {
  return s === 'BEGIN' || s === 'END';
}

export function isMarkerKind(s: string): s is MarkerKind {
  return MARKER_KINDS.some((k) => k === s);
}

export function makeRegionId(kind: MarkerKind, ordinal: number): string {
  return `${kind}:${ordinal}`;
}

export function parseRegionId(id: string): { kind: MarkerKind; ordinal: number } | null {
  const m = /^(exp|pr|sk):(\d+)$/.exec(id);
  if (!m || !isMarkerKind(m[1])) return null;
  const ordinal = Number(m[2]);
  if (!Number.isSafeInteger(ordinal)) return null;
  return { kind: m[1], ordinal };
}

export function markerId(m: Marker): string {
  return m.id;
}

/**
 * Find every BEGIN/END token in a fragment, in order of appearance.
 * Tokens that fail the grammar (unknown kind, non-numeric or negative ordinal)
 * are plain text and produce nothing.
 */
export function scanMarkers(fragment: Fragment): Marker[] {
  const out: Marker[] = [];
  for (const m of fragment.text.matchAll(markerRegExp())) {
    const [, boundary, kind, digits] = m;
    const ordinal = Number(digits);
    if (!isBoundary(boundary) || !isMarkerKind(kind) || !Number.isSafeInteger(ordinal)) continue;
    out.push({ boundary, kind, ordinal, id: `${kind}:${digits}`, index: m.index ?? 0, fragment });
  }
  return out;
}

/** Remove every marker token and trim. Idempotent; non-marker text is untouched. */
export function stripMarkers(text: string): string {
  let out = text;
  // Removing one token can splice the text around it into a new one.
  while (containsMarkerSyntax(out)) out = out.replace(markerRegExp(), '');
  return out.trim();
}

export function containsMarkerSyntax(text: string): boolean {
  return markerRegExp().test(text);
}
