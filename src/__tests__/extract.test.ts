import { describe, it, expect, vi, afterEach } from 'vitest';
import { extractPdfPages, parsePageTextItems } from '../pdf/extract.js';
import { pageFragments, parsePdfDocumentToRegions } from '../pdf/pipeline.js';
import type { PdfDocLike, PdfPageLike, PdfTextContentLike } from '../pdf/types.js';

type RawItem = { str: string; x: number; y: number; width: number; size?: number };

function textItem({ str, x, y, width, size = 10 }: RawItem) {
  return { str, transform: [size, 0, 0, size, x, y], width, height: size };
}

function fakePage(items: unknown[], width = 612, height = 792): PdfPageLike & { content: PdfTextContentLike } {
  const content: PdfTextContentLike = { items };
  return {
    content,
    getViewport: ({ scale }) => ({ width: width * scale, height: height * scale }),
    getTextContent: async () => content,
    render: () => ({ promise: Promise.resolve() }),
  };
}

function fakeDoc(pages: Array<PdfPageLike | Error>): PdfDocLike & { destroyed: boolean } {
  const doc = {
    destroyed: false,
    numPages: pages.length,
    async getPage(pageNum: number): Promise<PdfPageLike> {
      const page = pages[pageNum - 1];
      if (page instanceof Error) throw page;
      return page;
    },
    async destroy(): Promise<void> {
      doc.destroyed = true;
    },
  };
  return doc;
}

// Three text runs: "Hello" + "world" on one line, a BEGIN marker just below,
// and a paragraph far down the page that closes the region.
const RESUME_PAGE_ITEMS: unknown[] = [
  textItem({ str: 'Hello', x: 72, y: 700, width: 25 }),
  { str: ' ', transform: [10, 0, 0, 10, 97, 700], width: 0, height: 10 },
  { type: 'beginMarkedContent', id: 'mc0' },
  textItem({ str: 'world', x: 97, y: 700, width: 25 }),
  textItem({ str: '[BEGIN exp:1]', x: 72, y: 686, width: 60 }),
  textItem({ str: 'Led the team [END exp:1]', x: 72, y: 600, width: 100 }),
];

describe('parsePageTextItems', () => {
  it('converts PDF user space to top-left page coordinates', () => {
    const page = fakePage(RESUME_PAGE_ITEMS);
    const raw = parsePageTextItems(0, page, page.content);

    expect(raw.width).toBe(612);
    expect(raw.height).toBe(792);
    expect(raw.bodyFontSize).toBe(10);
    expect(raw.items.map((it) => it.str)).toEqual(['Hello', 'world', '[BEGIN exp:1]', 'Led the team [END exp:1]']);
    // Top = 792 - (700 + 10); bottom includes a 2pt descent below the baseline.
    expect(raw.items[0].bbox).toEqual({ x0: 72, y0: 82, x1: 97, y1: 94 });
    expect(raw.items[0].padEnd).toBe(true);
    expect(raw.items[1].padEnd).toBe(false);
  });

  it('falls back to the font size when an item has no height', () => {
    const page = fakePage([{ str: 'Skills', transform: [12, 0, 0, 12, 50, 500], width: 30 }]);
    const raw = parsePageTextItems(2, page, page.content);
    expect(raw.items[0]).toMatchObject({ pageIndex: 2, fontSize: 12, bbox: { x0: 50, y0: 280, x1: 80 } });
    expect(raw.items[0].bbox.y1).toBeCloseTo(294.4, 6);
  });

  it('tolerates missing or malformed content', () => {
    const page = fakePage([]);
    expect(parsePageTextItems(0, page, {}).items).toEqual([]);
    expect(parsePageTextItems(0, page, { items: [null, 42, { str: 7 }] }).items).toEqual([]);
  });
});

describe('pageFragments', () => {
  it('groups items into lines and lines into fragments', () => {
    const page = fakePage(RESUME_PAGE_ITEMS);
    const fragments = pageFragments(parsePageTextItems(0, page, page.content));

    expect(fragments).toEqual([
      { pageIndex: 0, rect: { x0: 72, y0: 82, x1: 132, y1: 108 }, text: 'Hello world\n[BEGIN exp:1]' },
      { pageIndex: 0, rect: { x0: 72, y0: 182, x1: 172, y1: 194 }, text: 'Led the team [END exp:1]' },
    ]);
  });
});

describe('document extraction', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves regions from a loaded document', async () => {
    const doc = fakeDoc([fakePage(RESUME_PAGE_ITEMS)]);
    const { regions, diagnostics } = await parsePdfDocumentToRegions(doc);

    expect(diagnostics).toEqual([]);
    expect(regions.get('exp:1')).toEqual({
      id: 'exp:1',
      kind: 'exp',
      ordinal: 1,
      pageIndex: 0,
      rect: { x0: 72, y0: 82, x1: 172, y1: 194 },
      text: 'Hello world\n\nLed the team',
    });
  });

  it('keeps page numbering when one page fails to extract', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const doc = fakeDoc([new Error('bad xref'), fakePage(RESUME_PAGE_ITEMS)]);

    const pages = await extractPdfPages(doc);
    expect(pages.map((p) => [p.pageIndex, p.items.length])).toEqual([
      [0, 0],
      [1, 4],
    ]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('stops at maxPages', async () => {
    const doc = fakeDoc([fakePage([]), fakePage([]), fakePage([])]);
    expect(await extractPdfPages(doc, { maxPages: 2 })).toHaveLength(2);
  });
});
