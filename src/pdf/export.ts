// src/pdf/export.ts
// Regions → portable JSON: { "<kind>:<ordinal>": { type, ordinal, page, rect: [x0, y0, x1, y1] } }.
// Pure data transform; rect values are written exactly as resolved.

import { randomBytes } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { MarkerKind, RegionMap } from './types.js';
import { isMarkerKind, parseRegionId } from './markers.js';

export type RegionExportEntry = {
  type: MarkerKind;
  ordinal: number;
  page: number;
  rect: [number, number, number, number];
};

export type RegionExport = Record<string, RegionExportEntry>;

export function regionsToJson(regions: RegionMap): RegionExport {
  const out: RegionExport = {};
  for (const [id, r] of regions) {
    out[id] = {
      type: r.kind,
      ordinal: r.ordinal,
      page: r.pageIndex,
      rect: [r.rect.x0, r.rect.y0, r.rect.x1, r.rect.y1],
    };
  }
  return out;
}

export function serializeRegions(regions: RegionMap): string {
  return JSON.stringify(regionsToJson(regions), null, 2);
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function parseEntry(id: string, raw: unknown): RegionExportEntry {
  if (typeof raw !== 'object' || raw === null) throw new Error(`Region "${id}" is not an object`);
  if (!('type' in raw) || !('ordinal' in raw) || !('page' in raw) || !('rect' in raw)) {
    throw new Error(`Region "${id}" is missing fields`);
  }
  const { type, ordinal, page, rect } = raw;
  if (typeof type !== 'string' || !isMarkerKind(type)) throw new Error(`Region "${id}" has an unknown type`);
  if (!isFiniteNumber(ordinal) || !Number.isSafeInteger(ordinal) || ordinal < 0) {
    throw new Error(`Region "${id}" has an invalid ordinal`);
  }
  if (!isFiniteNumber(page) || !Number.isSafeInteger(page) || page < 0) {
    throw new Error(`Region "${id}" has an invalid page`);
  }
  if (!Array.isArray(rect) || rect.length !== 4 || !rect.every(isFiniteNumber)) {
    throw new Error(`Region "${id}" has an invalid rect`);
  }
  const parsedId = parseRegionId(id);
  if (!parsedId || parsedId.kind !== type || parsedId.ordinal !== ordinal) {
    throw new Error(`Region "${id}" does not match its type/ordinal`);
  }
  const [x0, y0, x1, y1] = rect;
  return { type, ordinal, page, rect: [x0, y0, x1, y1] };
}

/** Read an export back; throws on anything that is not a valid export. */
export function parseRegionExport(json: string): RegionExport {
  const data: unknown = JSON.parse(json);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Region export must be a JSON object');
  }
  const out: RegionExport = {};
  for (const [id, raw] of Object.entries(data)) out[id] = parseEntry(id, raw);
  return out;
}

export function defaultExportPath(pdfPath: string): string {
  return `${pdfPath}.regions.json`;
}

/**
 * Write to a sibling temp file, then rename over the target: the target is
 * either the old file or the complete new one. Errors propagate.
 */
export async function writeFileAtomic(outPath: string, data: string | Uint8Array): Promise<void> {
  const tmp = path.join(path.dirname(outPath), `.${path.basename(outPath)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tmp, data);
    await rename(tmp, outPath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

export async function writeRegionExport(regions: RegionMap, outPath: string): Promise<string> {
  await writeFileAtomic(outPath, serializeRegions(regions));
  return outPath;
}
