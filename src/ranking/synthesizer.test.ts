import { describe, it, expect } from 'vitest';
import { composeAnswer, refineSection, scoreSentence, synthesizeAnswers, type SubsectionAnswer } from './synthesizer';
import { buildQueryVector, rankSections } from './ranker';
import { SectionIndex } from './section-index';
import { terms, type Tokenizer } from './tokenize';
import type { Section } from '../pdf/types';
import { DEFAULT_SETTINGS } from '../types';
import type { DeadlineLike } from '../services/deadline';

// Splits on full stops so expected sentences are exact.
const tokenizer: Tokenizer = {
  terms,
  sentences: (text) => text.split(/(?<=\.)\s+/).filter(Boolean),
};

const S0 = 'Short intro.';
const S1 = 'Revenue rose sharply in the northern region this year.';
const S2 = 'The office moved to a larger building downtown last spring.';
const S3 = 'Analysts expect revenue growth to continue next year too.';
const S4 = 'Done.';

function section(documentId: string, sectionTitle: string, bodyText: string, startPage = 1): Section {
  return { documentId, sectionTitle, startPage, endPage: startPage, bodyText, headingLevel: 'H1', ordinal: 0 };
}

const BODY = [S0, S1, S2, S3, S4].join(' ');
const index = SectionIndex.build([section('d', 'Update', BODY)], tokenizer);
const query = buildQueryVector(
  index,
  { job: 'revenue growth', profile: { category: 'generic', weightedVocabulary: new Map() } },
  DEFAULT_SETTINGS
);

describe('scoreSentence', () => {
  it('sums IDF of query terms, adds the edge bonus and subtracts the length penalty', () => {
    // Single-section corpus: every seen term has IDF 1.
    expect(scoreSentence(S0, 0, 5, index, query, DEFAULT_SETTINGS)).toBe(-0.5);
    expect(scoreSentence(S1, 1, 5, index, query, DEFAULT_SETTINGS)).toBe(1);
    expect(scoreSentence(S2, 2, 5, index, query, DEFAULT_SETTINGS)).toBe(0);
    expect(scoreSentence(S3, 3, 5, index, query, DEFAULT_SETTINGS)).toBe(2);
    expect(scoreSentence(S4, 4, 5, index, query, DEFAULT_SETTINGS)).toBe(-0.5);
  });
});

describe('refineSection', () => {
  it('picks the best sentences and keeps their original order', () => {
    expect(refineSection(BODY, index, query, DEFAULT_SETTINGS)).toBe([S1, S2, S3].join(' '));
  });

  it('returns an empty string for an empty body', () => {
    expect(refineSection('', index, query, DEFAULT_SETTINGS)).toBe('');
  });
});

describe('synthesizeAnswers', () => {
  const corpus = SectionIndex.build(
    [
      section('a', 'One', 'Revenue grew this year across every region we track.'),
      section('b', 'Two', 'Revenue growth slowed in the final quarter of the year.', 2),
      section('c', 'Three', 'Growth in revenue came mostly from the new product line.', 3),
    ],
    tokenizer
  );
  const rankingQuery = { job: 'revenue growth', profile: { category: 'generic' as const, weightedVocabulary: new Map<string, number>() } };
  const { ranked, queryVector } = rankSections(corpus, rankingQuery, DEFAULT_SETTINGS);

  it('answers each of the top sections with its start page', () => {
    const result = synthesizeAnswers(corpus, ranked, queryVector, DEFAULT_SETTINGS);
    expect(result.truncated).toBe(false);
    expect(result.answers).toHaveLength(3);
    expect(result.answers.map((a) => a.documentId)).toEqual(ranked.map((r) => r.section.documentId));
    const pages = new Map(ranked.map((r) => [r.section.documentId, r.section.startPage]));
    for (const answer of result.answers) expect(answer.page).toBe(pages.get(answer.documentId));
  });

  it('limits answers to the configured number of sections', () => {
    const result = synthesizeAnswers(corpus, ranked, queryVector, { ...DEFAULT_SETTINGS, topSections: 2 });
    expect(result.answers).toHaveLength(2);
  });

  it('stops at the deadline and keeps the answers already written', () => {
    let checks = 0;
    const deadline: DeadlineLike = { expired: () => checks++ >= 1 };
    const result = synthesizeAnswers(corpus, ranked, queryVector, DEFAULT_SETTINGS, deadline);
    expect(result.truncated).toBe(true);
    expect(result.answers).toHaveLength(1);
    expect(result.answers[0].documentId).toBe(ranked[0].section.documentId);
  });

  it('produces nothing for an empty ranking', () => {
    expect(synthesizeAnswers(corpus, [], queryVector, DEFAULT_SETTINGS)).toEqual({ answers: [], truncated: false });
  });

  it('skips top sections that have no body text', () => {
    const withHeadingOnly = SectionIndex.build(
      [section('a', 'Cover', ''), section('b', 'Figures', 'Revenue growth held up well.', 2)],
      tokenizer
    );
    const ranking = rankSections(withHeadingOnly, rankingQuery, DEFAULT_SETTINGS);
    const result = synthesizeAnswers(withHeadingOnly, ranking.ranked, ranking.queryVector, DEFAULT_SETTINGS);
    expect(result.answers).toEqual([
      { documentId: 'b', sectionTitle: 'Figures', refinedText: 'Revenue growth held up well.', page: 2 },
    ]);
  });
});

describe('composeAnswer', () => {
  const answer = (refinedText: string): SubsectionAnswer => ({ documentId: 'd', sectionTitle: 'T', refinedText, page: 1 });

  it('joins the first three answers behind the persona label', () => {
    const answers = ['One.', 'Two.', 'Three.', 'Four.'].map(answer);
    expect(composeAnswer(answers, 'Analysis')).toBe('Analysis: One. Two. Three.');
  });

  it('leaves unlabelled answers bare and empty input empty', () => {
    expect(composeAnswer([answer('Only this.')])).toBe('Only this.');
    expect(composeAnswer([], 'Analysis')).toBe('');
  });
});
