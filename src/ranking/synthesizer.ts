// src/ranking/synthesizer.ts
// Extractive answers: the best few sentences of each top section, in reading order.

import type { OutlinerSettings } from '../types';
import { NO_DEADLINE, type DeadlineLike } from '../services/deadline';
import type { RankedSection, QueryVector } from './ranker';
import type { SectionIndex } from './section-index';

type SynthesisSettings = Pick<
  OutlinerSettings,
  | 'topSections'
  | 'sentencesPerAnswer'
  | 'sentenceMinLength'
  | 'sentenceMaxLength'
  | 'sentencePositionBonus'
  | 'sentenceLengthPenalty'
>;

export type SubsectionAnswer = {
  documentId: string;
  sectionTitle: string;
  refinedText: string;
  page: number;
};

export type SynthesisResult = {
  answers: SubsectionAnswer[];
  truncated: boolean;
};

export function scoreSentence(
  sentence: string,
  position: number,
  count: number,
  index: SectionIndex,
  query: QueryVector,
  settings: SynthesisSettings
): number {
  let overlap = 0;
  for (const term of new Set(index.tokenizer.terms(sentence))) {
    if (query.weights.has(term)) overlap += index.idf(term);
  }
  const edge = position === 0 || position === count - 1 ? settings.sentencePositionBonus : 0;
  const length = sentence.length;
  const outside = length < settings.sentenceMinLength || length > settings.sentenceMaxLength;
  return overlap + edge - (outside ? settings.sentenceLengthPenalty : 0);
}

/** Picks the top sentences by score (earlier wins ties) and rejoins them in original order. */
export function refineSection(
  bodyText: string,
  index: SectionIndex,
  query: QueryVector,
  settings: SynthesisSettings
): string {
  const all = Array.from(index.tokenizer.sentences(bodyText));
  const picked = all
    .map((text, position) => ({ text, position, score: scoreSentence(text, position, all.length, index, query, settings) }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .slice(0, Math.max(0, settings.sentencesPerAnswer))
    .sort((a, b) => a.position - b.position);
  return picked.map((s) => s.text).join(' ');
}

export function synthesizeAnswers(
  index: SectionIndex,
  ranked: readonly RankedSection[],
  query: QueryVector,
  settings: SynthesisSettings,
  deadline: DeadlineLike = NO_DEADLINE
): SynthesisResult {
  const answers: SubsectionAnswer[] = [];
  for (const { section } of ranked.slice(0, Math.max(0, settings.topSections))) {
    if (deadline.expired()) return { answers, truncated: true };
    const refinedText = refineSection(section.bodyText, index, query, settings);
    // Heading-only sections have nothing to quote.
    if (!refinedText) continue;
    answers.push({
      documentId: section.documentId,
      sectionTitle: section.sectionTitle,
      refinedText,
      page: section.startPage,
    });
  }
  return { answers, truncated: false };
}

export const ANSWER_PARTS = 3;

/**
 * Joins the first few refined texts into one reply, prefixed with the persona's
 * label ("Analysis: ...") when it has one. Empty when there is nothing to quote.
 */
export function composeAnswer(answers: readonly SubsectionAnswer[], label = ''): string {
  const body = answers
    .slice(0, ANSWER_PARTS)
    .map((a) => a.refinedText)
    .join(' ');
  if (!body) return '';
  return label ? `${label}: ${body}` : body;
}
