// src/pdf/lines.ts
// Fragment normaliser: sanitise raw fragments, drop page chrome, merge same-style lines.

import type { DocumentInput, ExclusionLogEntry, TextFragment, TextFragmentInput } from './types';
import type { OutlinerSettings } from '../types';
import { createIssue, type ProcessingIssue } from '../services/issues';
import { detectRepeatedHeaderFooters } from './exclusions';
import { hasNumberingPrefix, matchesHeadingShape } from './patterns';
import { clamp01, collapseWhitespace } from './utils';

const FONT_SIZE_TOLERANCE = 0.01;

type Sanitised = { fragment: TextFragment; malformed: boolean };

function asFiniteNumber(n: unknown): number | null {
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

/**
 * Repairs one raw fragment. Anything unusable falls back to the safest value:
 * lowest font tier, not bold, bottom of the page.
 */
export function sanitizeFragment(raw: TextFragmentInput, documentId: string, fallbackPage: number): Sanitised {
  let malformed = false;

  const text = typeof raw.text === 'string' ? collapseWhitespace(raw.text) : '';
  if (typeof raw.text !== 'string') malformed = true;

  const size = asFiniteNumber(raw.fontSize);
  if (size === null) malformed = true;
  const fontSize = size !== null && size > 0 ? size : 0;

  if (typeof raw.bold !== 'boolean') malformed = true;
  const bold = raw.bold === true;

  const top = asFiniteNumber(raw.top);
  if (top === null) malformed = true;

  const page = asFiniteNumber(raw.page);
  if (page === null) malformed = true;

  return {
    fragment: {
      text,
      fontSize,
      bold,
      top: top === null ? 1 : clamp01(top),
      page: page === null ? fallbackPage : Math.trunc(page),
      documentId,
    },
    malformed,
  };
}

function canMerge(prev: TextFragment, prevLastTop: number, next: TextFragment, mergeGap: number): boolean {
  if (prev.page !== next.page) return false;
  if (prev.bold !== next.bold) return false;
  if (Math.abs(prev.fontSize - next.fontSize) > FONT_SIZE_TOLERANCE) return false;
  const gap = next.top - prevLastTop;
  if (gap < 0 || gap > mergeGap) return false;
  // Heading-shaped lines stand alone even when styled like their neighbours.
  return !hasNumberingPrefix(next.text) && !matchesHeadingShape(prev.text) && !matchesHeadingShape(next.text);
}

/**
 * Collapses vertically adjacent fragments of identical style into single lines.
 * The merged line keeps the first fragment's position.
 */
export function mergeAdjacentFragments(fragments: readonly TextFragment[], mergeGap: number): TextFragment[] {
  const out: TextFragment[] = [];
  let lastTop = Number.NaN;

  for (const f of fragments) {
    const prev = out[out.length - 1];
    if (prev && canMerge(prev, lastTop, f, mergeGap)) {
      out[out.length - 1] = { ...prev, text: `${prev.text} ${f.text}` };
    } else {
      out.push(f);
    }
    lastTop = f.top;
  }
  return out;
}

export type NormalizedDocument = {
  fragments: TextFragment[];
  // Kept fragments before line merging; font statistics are taken over these.
  lines: TextFragment[];
  exclusions: ExclusionLogEntry[];
  issues: ProcessingIssue[];
};

export function normalizeDocument(doc: DocumentInput, settings: OutlinerSettings): NormalizedDocument {
  const exclusions: ExclusionLogEntry[] = [];
  const issues: ProcessingIssue[] = [];
  const cleaned: TextFragment[] = [];
  let malformedCount = 0;

  doc.pages.forEach((page, pageIdx) => {
    for (const raw of page) {
      const { fragment, malformed } = sanitizeFragment(raw, doc.documentId, pageIdx + 1);
      if (malformed) malformedCount++;
      if (!fragment.text) {
        exclusions.push({ page: fragment.page, reason: 'EMPTY', excerpt: '' });
        continue;
      }
      cleaned.push(fragment);
    }
  });

  if (malformedCount > 0) {
    issues.push(createIssue('MalformedFragment', `${malformedCount} fragment(s) repaired with safe defaults`, {
      documentId: doc.documentId,
      detail: { count: malformedCount },
    }));
  }

  const chrome = detectRepeatedHeaderFooters(cleaned, {
    pageCount: doc.pages.length,
    band: settings.headerFooterBand,
    minPageRatio: settings.repeatPageRatio,
  });

  const kept: TextFragment[] = [];
  cleaned.forEach((f, idx) => {
    if (chrome.has(idx)) {
      exclusions.push({ page: f.page, reason: 'HEADER_FOOTER', excerpt: f.text.slice(0, 180) });
      return;
    }
    kept.push(f);
  });

  return {
    fragments: mergeAdjacentFragments(kept, settings.mergeGap),
    lines: kept,
    exclusions,
    issues,
  };
}
