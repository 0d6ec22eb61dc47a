import { describe, it, expect } from 'vitest';
import { computeFontStats, detectStructure, scoreFragment, sizeTier } from './headings';
import type { TextFragment } from './types';
import { DEFAULT_SETTINGS } from '../types';

function frag(text: string, fontSize: number, bold: boolean, top: number, page = 1): TextFragment {
  return { text, fontSize, bold, top, page, documentId: 'doc' };
}

// Sizes: six body lines at 10, then 13, 16, 16, 20 -> median 10, p75 15.25, p90 16.4.
const REPORT: TextFragment[] = [
  frag('Quarterly Review', 20, true, 0.05),
  frag('1. Overview', 16, true, 0.2),
  frag('This report covers the quarter.', 10, false, 0.25),
  frag('Revenue grew across regions.', 10, false, 0.3),
  frag('1.1 Regional detail', 13, false, 0.5),
  frag('The north region led growth.', 10, false, 0.55),
  frag('Costs were stable overall.', 10, false, 0.6),
  frag('Margins held.', 10, false, 0.7),
  frag('2. Outlook', 16, true, 0.1, 2),
  frag('We expect steady demand.', 10, false, 0.2, 2),
];

describe('font statistics and size tiers', () => {
  it('derives median and upper percentiles from positive sizes', () => {
    const stats = computeFontStats(REPORT);
    expect(stats.median).toBe(10);
    expect(stats.p75).toBeCloseTo(15.25, 10);
    expect(stats.p90).toBeCloseTo(16.4, 10);
  });

  it('maps sizes onto tiers 0..3', () => {
    const stats = { median: 10, p75: 15.25, p90: 16.4 };
    expect(sizeTier(10, stats)).toBe(0);
    expect(sizeTier(13, stats)).toBe(1);
    expect(sizeTier(16, stats)).toBe(2);
    expect(sizeTier(20, stats)).toBe(3);
    expect(sizeTier(0, stats)).toBe(0);
  });
});

describe('scoreFragment', () => {
  const stats = { median: 10, p75: 15.25, p90: 16.4 };

  it('adds size, style, pattern and position signals', () => {
    expect(scoreFragment(frag('1. Overview', 16, true, 0.2), stats, DEFAULT_SETTINGS)).toEqual({
      sizeTier: 2,
      styleBonus: 1,
      patternBonus: 1,
      positionBonus: 1,
      total: 5,
      eligible: true,
    });
  });

  it('never makes a heading from position alone', () => {
    const score = scoreFragment(frag('This report covers the quarter.', 10, false, 0.1), stats, DEFAULT_SETTINGS);
    expect(score.total).toBe(1);
    expect(score.eligible).toBe(false);
  });

  it('applies the length gate', () => {
    expect(scoreFragment(frag('IV', 20, true, 0.5), stats, DEFAULT_SETTINGS).eligible).toBe(false);
    expect(scoreFragment(frag('X'.repeat(121), 20, true, 0.5), stats, DEFAULT_SETTINGS).eligible).toBe(false);
  });

  it('does not depend on the order fragments are scored in', () => {
    const forward = REPORT.map((f) => scoreFragment(f, stats, DEFAULT_SETTINGS));
    const backward = REPORT.slice().reverse().map((f) => scoreFragment(f, stats, DEFAULT_SETTINGS)).reverse();
    expect(backward).toEqual(forward);
  });
});

describe('detectStructure', () => {
  it('picks the title from the first page and tiers the rest by distinct score', () => {
    const result = detectStructure(REPORT, 'doc', DEFAULT_SETTINGS);
    expect(result.title).toBe('Quarterly Review');
    expect(result.outline).toEqual([
      { level: 'H1', text: '1. Overview', page: 1 },
      { level: 'H2', text: '1.1 Regional detail', page: 1 },
      { level: 'H1', text: '2. Outlook', page: 2 },
    ]);
    expect(result.fragments.map((c) => c.level)).toEqual([
      'Title', 'H1', 'Body', 'Body', 'H2', 'Body', 'Body', 'Body', 'H1', 'Body',
    ]);
  });

  it('falls back to the document id when nothing qualifies as a title', () => {
    const plain = [frag('just some words here', 10, false, 0.1), frag('and some more words', 10, false, 0.5)];
    const result = detectStructure(plain, 'plain-doc', DEFAULT_SETTINGS);
    expect(result.title).toBe('plain-doc');
    expect(result.outline).toEqual([]);
  });

  it('returns an empty result for empty input', () => {
    expect(detectStructure([], 'empty', DEFAULT_SETTINGS)).toEqual({ title: 'empty', outline: [], fragments: [] });
  });

  it('caps a heading that skips levels at one below its predecessor', () => {
    // Sizes: seven at 10, then 14, 16, 24 -> median 10, p75 13, p90 16.8.
    const fragments = [
      frag('Field Notes', 24, true, 0.05),
      frag('Background', 10, false, 0.5),
      frag('Notes were taken daily.', 10, false, 0.55),
      frag('Weather was mild.', 10, false, 0.6),
      frag('2. Methods', 16, true, 0.5, 2),
      frag('Samples came from ponds.', 10, false, 0.55, 2),
      frag('Sampling plan', 14, true, 0.6, 2),
      frag('Each pond was visited.', 10, false, 0.65, 2),
      frag('Visits lasted an hour.', 10, false, 0.7, 2),
      frag('Results were logged.', 10, false, 0.75, 2),
    ];
    const result = detectStructure(fragments, 'notes', DEFAULT_SETTINGS);
    // "Background" scores lowest (H3) but follows the title directly, so it becomes H1.
    expect(result.outline).toEqual([
      { level: 'H1', text: 'Background', page: 1 },
      { level: 'H1', text: '2. Methods', page: 2 },
      { level: 'H2', text: 'Sampling plan', page: 2 },
    ]);
  });

  it('collapses repeated headings on nearby pages', () => {
    const fragments = [
      frag('Guide', 20, true, 0.05),
      frag('OVERVIEW', 14, true, 0.5),
      frag('first body line', 10, false, 0.6),
      frag('OVERVIEW', 14, true, 0.5, 2),
      frag('second body line', 10, false, 0.6, 2),
      frag('OVERVIEW', 14, true, 0.5, 5),
      frag('third body line', 10, false, 0.6, 5),
    ];
    const result = detectStructure(fragments, 'guide', DEFAULT_SETTINGS);
    expect(result.outline).toEqual([
      { level: 'H1', text: 'OVERVIEW', page: 1 },
      { level: 'H1', text: 'OVERVIEW', page: 5 },
    ]);
    expect(result.fragments[3].level).toBe('Body');
  });

  it('keeps outline depth jumps to at most one level', () => {
    const { outline } = detectStructure(REPORT, 'doc', DEFAULT_SETTINGS);
    const depth = { H1: 1, H2: 2, H3: 3 };
    let prev = 0;
    for (const entry of outline) {
      expect(depth[entry.level] - prev).toBeLessThanOrEqual(1);
      prev = depth[entry.level];
    }
  });
});
