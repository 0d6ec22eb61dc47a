// src/pdf/extract.ts
// PDF.js extraction adapter: PDF bytes → per-page positioned text fragments.
//
// This is boundary glue. The structure pipeline only sees `DocumentInput`, so any
// other extractor producing the same shape can replace it.

import type { DocumentInput, TextFragmentInput } from './types';
import { clamp01, stableSortBy } from './utils';

// ---- Minimal PDF.js-like surface types (avoid coupling to a particular PDF.js build)

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfPageLike = {
  getViewport: (opts: { scale: number }) => { width: number; height: number };
  getTextContent: () => Promise<PdfTextContentLike>;
  // Resolves the page's fonts so their real names can be read from commonObjs.
  getOperatorList?: () => Promise<unknown>;
  commonObjs?: { has(objId: string): boolean; get(objId: string): unknown };
};

export type PdfDocLike = {
  numPages: number;
  getPage: (pageNum: number) => Promise<PdfPageLike>;
};

const BOLD_FONT = /bold|black|heavy|semibold|demi/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

function resolveFontName(page: PdfPageLike, fontId: string): string {
  const objs = page.commonObjs;
  if (!objs || !fontId || !objs.has(fontId)) return fontId;
  const font = objs.get(fontId);
  return isRecord(font) && typeof font.name === 'string' ? font.name : fontId;
}

export function parsePageFragments(pageNum: number, page: PdfPageLike, content: PdfTextContentLike): TextFragmentInput[] {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];
  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: Array<TextFragmentInput & { x0n: number; topN: number }> = [];
  for (const raw of rawItems) {
    if (!isRecord(raw) || typeof raw.str !== 'string' || !raw.str.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(raw.transform);
    // Approx font size (purely geometric, deterministic).
    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), 0);
    const h = asNum(raw.height, fontSize);
    // PDF origin bottom-left, so invert.
    const topN = clamp01(1 - (y + h) / pageH);
    const fontId = typeof raw.fontName === 'string' ? raw.fontName : '';

    parsed.push({
      text: raw.str,
      fontSize,
      bold: BOLD_FONT.test(resolveFontName(page, fontId)),
      top: topN,
      page: pageNum,
      x0n: clamp01(x / pageW),
      topN,
    });
  }

  return stableSortBy(parsed, (p) => (p.topN * 10_000) + p.x0n).map(({ text, fontSize, bold, top, page }) => ({
    text,
    fontSize,
    bold,
    top,
    page,
  }));
}

export async function loadPdfDocument(data: ArrayBuffer | Uint8Array): Promise<PdfDocLike> {
  // Loaded on demand so callers that never touch PDFs skip PDF.js start-up.
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const uint8 = data instanceof Uint8Array ? data : new Uint8Array(data);
  const loadingTask = getDocument({ data: uint8, isEvalSupported: false });
  return await loadingTask.promise;
}

export async function extractDocument(
  pdf: PdfDocLike,
  documentId: string,
  opts?: { maxPages?: number }
): Promise<DocumentInput> {
  const maxPages = opts?.maxPages ?? 500;
  const totalPages = Math.min(pdf.numPages, maxPages);
  const pages: TextFragmentInput[][] = [];

  for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
    try {
      const page = await pdf.getPage(pageNum);
      const content = await page.getTextContent();
      if (page.getOperatorList) await page.getOperatorList();
      pages.push(parsePageFragments(pageNum, page, content));
    } catch (err) {
      console.error('[Outliner][extract] failed to extract page', { documentId, pageNum, err });
      // Preserve page numbering: emit empty page.
      pages.push([]);
    }
  }
  return { documentId, pages };
}
