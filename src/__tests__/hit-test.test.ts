import { describe, it, expect } from 'vitest';
import { cursorForPoint, hitTestRegion } from '../pdf/hit-test.js';
import type { Region, RegionMap } from '../pdf/types.js';

function region(id: string, pageIndex: number, x0: number, y0: number, x1: number, y1: number): Region {
  const [kind, ordinal] = id.split(':');
  return {
    id,
    kind: kind === 'pr' ? 'pr' : kind === 'sk' ? 'sk' : 'exp',
    ordinal: Number(ordinal),
    pageIndex,
    rect: { x0, y0, x1, y1 },
    text: `text of ${id}`,
  };
}

function mapOf(...rs: Region[]): RegionMap {
  return new Map(rs.map((r) => [r.id, r]));
}

describe('hitTestRegion', () => {
  const regions = mapOf(
    region('exp:1', 0, 72, 100, 300, 140),
    region('sk:1', 0, 72, 200, 300, 240),
    region('exp:2', 1, 72, 100, 300, 140)
  );

  it('maps the display point back through the scale', () => {
    // (150, 180) at 1.5 → (100, 120) in document space.
    expect(hitTestRegion(regions, 0, { x: 150, y: 180 }, 1.5)?.id).toBe('exp:1');
    expect(hitTestRegion(regions, 0, { x: 150, y: 330 }, 1.5)?.id).toBe('sk:1');
  });

  it('only considers regions on the current page', () => {
    expect(hitTestRegion(regions, 1, { x: 100, y: 120 }, 1)?.id).toBe('exp:2');
    expect(hitTestRegion(regions, 2, { x: 100, y: 120 }, 1)).toBeNull();
  });

  it('counts points on the edge as inside', () => {
    expect(hitTestRegion(regions, 0, { x: 72, y: 100 }, 1)?.id).toBe('exp:1');
    expect(hitTestRegion(regions, 0, { x: 300, y: 140 }, 1)?.id).toBe('exp:1');
    expect(hitTestRegion(regions, 0, { x: 300.5, y: 140 }, 1)).toBeNull();
  });

  it('returns null in the gap between regions and for bad input', () => {
    expect(hitTestRegion(regions, 0, { x: 100, y: 170 }, 1)).toBeNull();
    expect(hitTestRegion(regions, 0, { x: 100, y: 120 }, 0)).toBeNull();
    expect(hitTestRegion(regions, 0, { x: Number.NaN, y: 120 }, 1)).toBeNull();
    expect(hitTestRegion(new Map(), 0, { x: 100, y: 120 }, 1)).toBeNull();
  });

  it('returns the first region in map order when rects overlap', () => {
    const overlapping = mapOf(region('pr:1', 0, 0, 0, 50, 50), region('pr:2', 0, 25, 25, 75, 75));
    expect(hitTestRegion(overlapping, 0, { x: 30, y: 30 }, 1)?.id).toBe('pr:1');
  });
});

describe('cursorForPoint', () => {
  it('shows a pointer over a region and the default cursor elsewhere', () => {
    const regions = mapOf(region('exp:1', 0, 0, 0, 10, 10));
    expect(cursorForPoint(regions, 0, { x: 5, y: 5 }, 1)).toBe('pointer');
    expect(cursorForPoint(regions, 0, { x: 50, y: 5 }, 1)).toBe('default');
  });
});
