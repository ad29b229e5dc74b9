import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  regionsOnPage,
  resolveDocumentRegions,
  resolvePageRegions,
  summarizeRegions,
} from '../pdf/regions.js';
import type { Fragment } from '../pdf/types.js';

function frag(y0: number, y1: number, text: string, pageIndex = 0): Fragment {
  return { pageIndex, rect: { x0: 0, y0, x1: 10, y1 }, text };
}

describe('resolvePageRegions', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves a pair inside one fragment to that fragment', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [
      { pageIndex: 0, rect: { x0: 72, y0: 100, x1: 300, y1: 140 }, text: '[BEGIN exp:1] Led the payments team [END exp:1]' },
    ]);
    expect(diagnostics).toEqual([]);
    expect(regions.get('exp:1')).toEqual({
      id: 'exp:1',
      kind: 'exp',
      ordinal: 1,
      pageIndex: 0,
      rect: { x0: 72, y0: 100, x1: 300, y1: 140 },
      text: 'Led the payments team',
    });
  });

  it('unions the rects of every fragment from BEGIN to END', () => {
    const { regions } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:1] Engineer'),
      frag(10, 20, 'Shipped things'),
      frag(20, 30, 'More things [END exp:1]'),
    ]);
    const r = regions.get('exp:1');
    expect(r?.rect).toEqual({ x0: 0, y0: 0, x1: 10, y1: 30 });
    expect(r?.text).toBe('Engineer\nShipped things\nMore things');
  });

  it('does not let fragments outside the pair leak into it', () => {
    const { regions } = resolvePageRegions(0, [
      frag(0, 10, 'Header'),
      frag(10, 20, '[BEGIN pr:2] Compiler'),
      frag(20, 30, 'Wrote a parser [END pr:2]'),
      frag(30, 40, 'Footer'),
    ]);
    expect(regions.get('pr:2')?.rect).toEqual({ x0: 0, y0: 10, x1: 10, y1: 30 });
    expect(regions.get('pr:2')?.text).toBe('Compiler\nWrote a parser');
  });

  it('keeps interleaved regions independent', () => {
    const { regions } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:1]'),
      frag(10, 20, '[BEGIN sk:1] Go'),
      frag(20, 30, '[END exp:1]'),
      frag(30, 40, 'Rust [END sk:1]'),
    ]);
    expect(regions.get('exp:1')?.rect).toEqual({ x0: 0, y0: 0, x1: 10, y1: 30 });
    expect(regions.get('sk:1')?.rect).toEqual({ x0: 0, y0: 10, x1: 10, y1: 40 });
    expect(regions.get('exp:1')?.text).toBe('Go');
    expect(regions.get('sk:1')?.text).toBe('Go\n\nRust');
  });

  it('drops a BEGIN left open at the end of the page', () => {
    const { regions, diagnostics } = resolvePageRegions(3, [frag(0, 10, 'x'), frag(10, 20, '[BEGIN exp:5] never closed')]);
    expect(regions.size).toBe(0);
    expect(diagnostics).toEqual([{ reason: 'unterminated', id: 'exp:5', pageIndex: 3, fragmentIndex: 1 }]);
  });

  it('ignores an END with no BEGIN', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [frag(0, 10, 'text [END sk:9]')]);
    expect(regions.size).toBe(0);
    expect(diagnostics).toEqual([{ reason: 'orphan-end', id: 'sk:9', pageIndex: 0, fragmentIndex: 0 }]);
  });

  it('keeps the first BEGIN when one id is opened twice', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:1] first'),
      frag(10, 20, '[BEGIN exp:1] second'),
      frag(20, 30, 'end [END exp:1]'),
    ]);
    expect(regions.get('exp:1')?.rect).toEqual({ x0: 0, y0: 0, x1: 10, y1: 30 });
    expect(regions.get('exp:1')?.text).toBe('first\n second\nend');
    expect(diagnostics).toEqual([{ reason: 'duplicate-begin', id: 'exp:1', pageIndex: 0, fragmentIndex: 1 }]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('closes one region and opens another in the same fragment', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:1] one'),
      frag(10, 20, 'tail [END exp:1] [BEGIN exp:2] two'),
      frag(20, 30, 'done [END exp:2]'),
    ]);
    expect(diagnostics).toEqual([]);
    expect(regions.get('exp:1')?.rect).toEqual({ x0: 0, y0: 0, x1: 10, y1: 20 });
    expect(regions.get('exp:2')?.rect).toEqual({ x0: 0, y0: 10, x1: 10, y1: 30 });
    expect(regions.get('exp:2')?.text).toBe('tail   two\ndone');
  });

  it('ignores a BEGIN of the same id in the fragment that closes it', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:1] a'),
      frag(10, 20, 'b [END exp:1] [BEGIN exp:1] again'),
      frag(20, 30, 'after'),
    ]);
    expect([...regions.keys()]).toEqual(['exp:1']);
    expect(regions.get('exp:1')?.rect).toEqual({ x0: 0, y0: 0, x1: 10, y1: 20 });
    expect(regions.get('exp:1')?.text).toBe('a\nb   again');
    expect(diagnostics).toEqual([{ reason: 'duplicate-begin', id: 'exp:1', pageIndex: 0, fragmentIndex: 1 }]);
  });

  it('pairs markers by their literal id', () => {
    const { regions, diagnostics } = resolvePageRegions(0, [
      frag(0, 10, '[BEGIN exp:01] padded [END exp:01]'),
      frag(10, 20, '[BEGIN pr:02] open'),
      frag(20, 30, 'close [END pr:2]'),
    ]);
    expect([...regions.keys()]).toEqual(['exp:01']);
    expect(regions.get('exp:01')).toMatchObject({ kind: 'exp', ordinal: 1, text: 'padded' });
    expect(diagnostics).toEqual([
      { reason: 'orphan-end', id: 'pr:2', pageIndex: 0, fragmentIndex: 2 },
      { reason: 'unterminated', id: 'pr:02', pageIndex: 0, fragmentIndex: 1 },
    ]);
  });

  it('returns nothing for a page without markers', () => {
    expect(resolvePageRegions(0, [frag(0, 10, 'plain')])).toEqual({ regions: new Map(), diagnostics: [] });
    expect(resolvePageRegions(0, [])).toEqual({ regions: new Map(), diagnostics: [] });
  });
});

describe('resolveDocumentRegions', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags each region with its page and never pairs across pages', () => {
    const { regions, diagnostics } = resolveDocumentRegions([
      [frag(0, 10, '[BEGIN exp:1] a [END exp:1]'), frag(10, 20, '[BEGIN exp:2] spills over')],
      [frag(0, 10, 'rest [END exp:2]', 1), frag(10, 20, '[BEGIN sk:1] b [END sk:1]', 1)],
    ]);
    expect([...regions.keys()]).toEqual(['exp:1', 'sk:1']);
    expect(regions.get('sk:1')?.pageIndex).toBe(1);
    expect(diagnostics).toEqual([
      { reason: 'unterminated', id: 'exp:2', pageIndex: 0, fragmentIndex: 1 },
      { reason: 'orphan-end', id: 'exp:2', pageIndex: 1, fragmentIndex: 0 },
    ]);
  });

  it('lets the later pair win when an id resolves twice, keeping its first position', () => {
    const { regions, diagnostics } = resolveDocumentRegions([
      [frag(0, 10, '[BEGIN pr:1] first [END pr:1]'), frag(10, 20, '[BEGIN sk:1] Go [END sk:1]')],
      [frag(50, 60, '[BEGIN pr:1] again [END pr:1]', 1)],
    ]);
    expect([...regions.keys()]).toEqual(['pr:1', 'sk:1']);
    expect(regions.get('pr:1')).toEqual({
      id: 'pr:1',
      kind: 'pr',
      ordinal: 1,
      pageIndex: 1,
      rect: { x0: 0, y0: 50, x1: 10, y1: 60 },
      text: 'again',
    });
    expect(diagnostics).toEqual([{ reason: 'duplicate-region', id: 'pr:1', pageIndex: 1, fragmentIndex: 0 }]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('lets a later pair on the same page replace an earlier one', () => {
    const { regions } = resolveDocumentRegions([
      [frag(0, 10, '[BEGIN exp:3] old [END exp:3]'), frag(20, 30, '[BEGIN exp:3] new [END exp:3]')],
    ]);
    expect(regions.get('exp:3')?.rect).toEqual({ x0: 0, y0: 20, x1: 10, y1: 30 });
    expect(regions.get('exp:3')?.text).toBe('new');
  });

  it('lists regions per page', () => {
    const { regions } = resolveDocumentRegions([
      [frag(0, 10, '[BEGIN exp:1] a [END exp:1]')],
      [frag(0, 10, '[BEGIN exp:2] b [END exp:2]', 1)],
    ]);
    expect(regionsOnPage(regions, 1).map((r) => r.id)).toEqual(['exp:2']);
    expect(regionsOnPage(regions, 2)).toEqual([]);
  });
});

describe('summarizeRegions', () => {
  it('orders by kind then ordinal and formats one line each', () => {
    const { regions } = resolveDocumentRegions([
      [
        { pageIndex: 0, rect: { x0: 1, y0: 2.24, x1: 3, y1: 4 }, text: '[BEGIN sk:1] Go [END sk:1]' },
        { pageIndex: 0, rect: { x0: 10, y0: 20, x1: 30, y1: 40 }, text: '[BEGIN exp:10] Ten [END exp:10]' },
        { pageIndex: 0, rect: { x0: 0, y0: 0, x1: 5, y1: 5 }, text: '[BEGIN exp:2] Two [END exp:2]' },
      ],
    ]);
    expect(summarizeRegions(regions)).toEqual([
      ' exp:2  page=1  rect=(0.0,0.0,5.0,5.0)  text_len=3',
      'exp:10  page=1  rect=(10.0,20.0,30.0,40.0)  text_len=3',
      '  sk:1  page=1  rect=(1.0,2.2,3.0,4.0)  text_len=2',
    ]);
  });
});
