// src/pdf/exclusions.ts
// Structural exclusions: running headers/footers found by repetition across pages.
// No vocabulary-based filtering.

import type { TextFragment } from './types';
import { normaliseForRepetition, quantize } from './utils';

type RepetitionOpts = {
  // Number of pages in the document, including pages without fragments.
  pageCount: number;
  // Height of the top/bottom candidate bands (normalised).
  band: number;
  // Minimum fraction of pages a signature must appear on.
  minPageRatio: number;
};

function repetitionKey(f: TextFragment, band: number): string | null {
  // candidate bands only
  if (!(f.top < band || f.top > 1 - band)) return null;
  const sig = normaliseForRepetition(f.text);
  if (!sig) return null;
  // Coarse quantisation keeps the key stable under small renderer drift.
  const qy = Math.round(quantize(f.top, 0.05) * 100);
  return `${qy}|${sig}`;
}

/**
 * Returns the indices of fragments that repeat at the same relative vertical
 * position on at least `minPageRatio` of the document's pages.
 */
export function detectRepeatedHeaderFooters(fragments: readonly TextFragment[], opts: RepetitionOpts): Set<number> {
  const distinctPages = new Set(fragments.map((f) => f.page)).size;
  const pageCount = Math.max(opts.pageCount, distinctPages);
  const out = new Set<number>();
  if (pageCount < 2) return out;

  const pagesByKey = new Map<string, Set<number>>();
  const keys: Array<string | null> = fragments.map((f) => repetitionKey(f, opts.band));

  fragments.forEach((f, idx) => {
    const key = keys[idx];
    if (key === null) return;
    const pages = pagesByKey.get(key) ?? new Set<number>();
    pages.add(f.page);
    pagesByKey.set(key, pages);
  });

  const repeatedKeys = new Set<string>();
  for (const [key, pages] of pagesByKey.entries()) {
    if (pages.size >= 2 && pages.size / pageCount >= opts.minPageRatio) repeatedKeys.add(key);
  }

  keys.forEach((key, idx) => {
    if (key !== null && repeatedKeys.has(key)) out.add(idx);
  });
  return out;
}
