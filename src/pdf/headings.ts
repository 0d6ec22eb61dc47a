// src/pdf/headings.ts
// Structure detector: composite heading score per fragment, then per-document tiering.
//
// Scoring is a pure function of (fragment, document font statistics, settings), so
// a fragment's score never depends on iteration order. Levels are relative: the
// document's highest distinct score becomes H1, whatever its absolute font size.

import type {
  ClassifiedFragment,
  FontStats,
  FragmentScore,
  HeadingLevel,
  OutlineEntry,
  OutlineLevel,
  StructureResult,
  TextFragment,
} from './types';
import { HEADING_DEPTH, OUTLINE_LEVELS } from './types';
import type { OutlinerSettings } from '../types';
import { cleanTitle, isNonTitleText, matchesHeadingShape } from './patterns';
import { median, percentile } from './utils';

type ScoreSettings = Pick<OutlinerSettings, 'minHeadingLength' | 'maxHeadingLength' | 'positionBand'>;
type DetectSettings = ScoreSettings & Pick<OutlinerSettings, 'duplicatePageWindow'>;

export function computeFontStats(fragments: readonly TextFragment[]): FontStats {
  const sizes = fragments
    .map((f) => f.fontSize)
    .filter((n) => Number.isFinite(n) && n > 0)
    .sort((a, b) => a - b);
  return {
    median: median(sizes),
    p75: percentile(sizes, 0.75),
    p90: percentile(sizes, 0.9),
  };
}

export function sizeTier(fontSize: number, stats: FontStats): FragmentScore['sizeTier'] {
  if (!(fontSize > 0) || fontSize <= stats.median) return 0;
  if (fontSize >= stats.p90) return 3;
  if (fontSize >= stats.p75) return 2;
  return 1;
}

export function scoreFragment(fragment: TextFragment, stats: FontStats, settings: ScoreSettings): FragmentScore {
  const tier = sizeTier(fragment.fontSize, stats);
  const styleBonus = fragment.bold ? 1 : 0;
  const patternBonus = matchesHeadingShape(fragment.text) ? 1 : 0;
  const positionBonus = fragment.top < settings.positionBand ? 1 : 0;

  const length = fragment.text.trim().length;
  const withinLength = length >= settings.minHeadingLength && length <= settings.maxHeadingLength;
  // Position alone never makes a heading.
  const intrinsic = tier > 0 || styleBonus > 0 || patternBonus > 0;

  return {
    sizeTier: tier,
    styleBonus,
    patternBonus,
    positionBonus,
    total: tier + styleBonus + patternBonus + positionBonus,
    eligible: withinLength && intrinsic,
  };
}

function isTitleCandidate(text: string): boolean {
  const cleaned = cleanTitle(text);
  return cleaned !== '' && !isNonTitleText(cleaned);
}

function pickTitle(fragments: readonly TextFragment[], scores: readonly FragmentScore[], positionBand: number): number {
  if (!fragments.length) return -1;
  const firstPage = fragments.reduce((min, f) => Math.min(min, f.page), Number.POSITIVE_INFINITY);
  let best = -1;
  fragments.forEach((f, idx) => {
    if (f.page !== firstPage || !(f.top < positionBand) || !scores[idx].eligible) return;
    if (!isTitleCandidate(f.text)) return;
    if (best < 0 || scores[idx].total > scores[best].total) best = idx;
  });
  return best;
}

const LEVEL_FOR_DEPTH: Record<number, OutlineLevel> = { 1: 'H1', 2: 'H2', 3: 'H3' };

function isOutlineLevel(level: HeadingLevel): level is OutlineLevel {
  return level === 'H1' || level === 'H2' || level === 'H3';
}

function collapseDuplicates(levels: HeadingLevel[], fragments: readonly TextFragment[], window: number): void {
  const kept = new Map<string, number[]>();
  levels.forEach((level, idx) => {
    if (!isOutlineLevel(level)) return;
    const f = fragments[idx];
    const key = `${level}|${f.text.trim().toLowerCase()}`;
    const pages = kept.get(key) ?? [];
    if (pages.some((p) => Math.abs(f.page - p) <= window)) {
      levels[idx] = 'Body';
      return;
    }
    pages.push(f.page);
    kept.set(key, pages);
  });
}

// Caps every heading at one level deeper than the heading before it.
function repairNesting(levels: HeadingLevel[]): void {
  let prevDepth = 0;
  levels.forEach((level, idx) => {
    if (level === 'Body') return;
    if (level === 'Title') {
      prevDepth = 0;
      return;
    }
    const depth = Math.min(HEADING_DEPTH[level], prevDepth + 1);
    levels[idx] = LEVEL_FOR_DEPTH[depth];
    prevDepth = depth;
  });
}

/**
 * Classifies every fragment. `stats` defaults to statistics over `fragments`
 * themselves; the pipeline passes per-line statistics taken before merging.
 */
export function detectStructure(
  fragments: readonly TextFragment[],
  documentId: string,
  settings: DetectSettings,
  stats: FontStats = computeFontStats(fragments)
): StructureResult {
  if (!fragments.length) return { title: documentId, outline: [], fragments: [] };

  const scores = fragments.map((f) => scoreFragment(f, stats, settings));
  const titleIdx = pickTitle(fragments, scores, settings.positionBand);

  // Distinct non-title totals, highest first: H1, H2, H3.
  const distinct = Array.from(
    new Set(scores.filter((s, idx) => s.eligible && idx !== titleIdx).map((s) => s.total))
  ).sort((a, b) => b - a);
  const levelByTotal = new Map<number, OutlineLevel>();
  distinct.slice(0, OUTLINE_LEVELS.length).forEach((total, i) => levelByTotal.set(total, OUTLINE_LEVELS[i]));

  const levels: HeadingLevel[] = scores.map((s, idx) => {
    if (idx === titleIdx) return 'Title';
    if (!s.eligible) return 'Body';
    return levelByTotal.get(s.total) ?? 'Body';
  });

  collapseDuplicates(levels, fragments, settings.duplicatePageWindow);
  repairNesting(levels);

  const outline: OutlineEntry[] = [];
  levels.forEach((level, idx) => {
    if (!isOutlineLevel(level)) return;
    const f = fragments[idx];
    const prev = outline[outline.length - 1];
    if (prev && prev.level === level && prev.text === f.text && prev.page === f.page) {
      levels[idx] = 'Body';
      return;
    }
    outline.push({ level, text: f.text, page: f.page });
  });

  const title = titleIdx >= 0 ? cleanTitle(fragments[titleIdx].text) : documentId;
  const classified: ClassifiedFragment[] = fragments.map((fragment, idx) => ({
    fragment: idx === titleIdx ? { ...fragment, text: title } : fragment,
    score: scores[idx],
    level: levels[idx],
  }));

  return {
    title,
    outline,
    fragments: classified,
  };
}
