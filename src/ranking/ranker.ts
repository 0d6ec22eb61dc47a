// src/ranking/ranker.ts
// Relevance ranker: query-vector cosine plus persona alignment, scaled by structural priors.

import type { Section } from '../pdf/types';
import type { OutlinerSettings } from '../types';
import { clamp01 } from '../pdf/utils';
import { createIssue, type ProcessingIssue } from '../services/issues';
import { NO_DEADLINE, type DeadlineLike } from '../services/deadline';
import type { PersonaProfile } from './personas';
import { cosine, type IndexedSection, type SectionIndex, type WeightedVector } from './section-index';
import { countTerms } from './tokenize';

type RankSettings = Pick<
  OutlinerSettings,
  'cosineWeight' | 'personaWeight' | 'levelMultipliers' | 'earlyPositionBoost' | 'personaTermRepeat'
>;

export type RankingQuery = {
  job: string;
  question?: string;
  profile: PersonaProfile;
};

export type QueryVector = WeightedVector & {
  // Raw (pre-IDF) term mass, including the synthetic persona repetitions.
  readonly termCounts: ReadonlyMap<string, number>;
};

export type RankedSection = {
  section: Section;
  score: number;
  importanceRank: number;
};

export type RankingResult = {
  ranked: RankedSection[];
  queryVector: QueryVector;
  // True when the deadline expired before every section was scored.
  truncated: boolean;
  issues: ProcessingIssue[];
};

export function buildQueryVector(index: SectionIndex, query: RankingQuery, settings: RankSettings): QueryVector {
  const counts = countTerms(index.tokenizer.terms(query.job));
  if (query.question) countTerms(index.tokenizer.terms(query.question), counts);
  for (const [term, weight] of query.profile.weightedVocabulary) {
    counts.set(term, (counts.get(term) ?? 0) + weight * settings.personaTermRepeat);
  }
  return { ...index.weigh(counts), termCounts: counts };
}

/** Weighted share of the section's distinct terms that belong to the persona vocabulary. */
export function personaAlignment(entry: IndexedSection, profile: PersonaProfile): number {
  const distinct = entry.termCounts.size;
  if (!distinct) return 0;
  let sum = 0;
  for (const term of entry.termCounts.keys()) sum += profile.weightedVocabulary.get(term) ?? 0;
  return sum / distinct;
}

// Linear from +boost on a document's first section down to 0 on its last.
function positionFactor(entry: IndexedSection, boost: number): number {
  const count = entry.documentSectionCount;
  if (count <= 1) return 1 + boost;
  return 1 + boost * (1 - entry.section.ordinal / (count - 1));
}

export function scoreSection(
  entry: IndexedSection,
  queryVector: QueryVector,
  profile: PersonaProfile,
  settings: RankSettings
): number {
  const base =
    settings.cosineWeight * cosine(queryVector, entry) + settings.personaWeight * personaAlignment(entry, profile);
  const multiplier = settings.levelMultipliers[entry.section.headingLevel];
  return clamp01(base * multiplier * positionFactor(entry, settings.earlyPositionBoost));
}

/**
 * Scores every indexed section and orders them. The result is always a complete
 * ranking: once the deadline expires, unscored sections keep score 0.
 */
export function rankSections(
  index: SectionIndex,
  query: RankingQuery,
  settings: RankSettings,
  deadline: DeadlineLike = NO_DEADLINE
): RankingResult {
  const queryVector = buildQueryVector(index, query, settings);
  if (!index.size) {
    return {
      ranked: [],
      queryVector,
      truncated: false,
      issues: [createIssue('EmptyCorpus', 'no sections to rank')],
    };
  }

  let truncated = false;
  const scored: Array<{ entry: IndexedSection; score: number }> = [];
  for (const entry of index.entries) {
    if (!truncated && deadline.expired()) truncated = true;
    scored.push({ entry, score: truncated ? 0 : scoreSection(entry, queryVector, query.profile, settings) });
  }

  scored.sort(
    (a, b) =>
      b.score - a.score ||
      a.entry.documentOrder - b.entry.documentOrder ||
      a.entry.section.startPage - b.entry.section.startPage ||
      a.entry.section.ordinal - b.entry.section.ordinal
  );

  return {
    ranked: scored.map(({ entry, score }, idx) => ({ section: entry.section, score, importanceRank: idx + 1 })),
    queryVector,
    truncated,
    issues: [],
  };
}
