import type { HeadingLevel } from './pdf/types';

export interface OutlinerSettings {
  // Fragment normalisation
  /** Largest normalised top-to-top gap for two same-style fragments to merge into one line */
  mergeGap: number;
  /** Fraction of pages a header/footer must repeat on before it is dropped */
  repeatPageRatio: number;
  /** Height of the top and bottom page bands searched for running headers/footers */
  headerFooterBand: number;

  // Structure detection
  minHeadingLength: number;
  maxHeadingLength: number;
  /** Fragments whose top lies above this fraction of the page get the position bonus */
  positionBand: number;
  /** Same heading text/level within this many pages collapses to the first occurrence */
  duplicatePageWindow: number;

  // Ranking
  cosineWeight: number;
  personaWeight: number;
  levelMultipliers: Record<HeadingLevel, number>;
  /** Boost for the first section of a document, decaying linearly to 0 by its last section */
  earlyPositionBoost: number;
  /** Persona vocabulary terms enter the query this many times, scaled by their weight */
  personaTermRepeat: number;
  personaMinScore: number;

  // Answer synthesis
  topSections: number;
  sentencesPerAnswer: number;
  sentenceMinLength: number;
  sentenceMaxLength: number;
  sentencePositionBonus: number;
  sentenceLengthPenalty: number;

  // Orchestration
  /** Soft wall-clock budget per run in ms; null disables the deadline */
  timeBudgetMs: number | null;
  concurrency: number;
}

export const DEFAULT_SETTINGS: OutlinerSettings = {
  mergeGap: 0.025,
  repeatPageRatio: 0.6,
  headerFooterBand: 0.12,
  minHeadingLength: 3,
  maxHeadingLength: 120,
  positionBand: 1 / 3,
  duplicatePageWindow: 1,
  cosineWeight: 0.7,
  personaWeight: 0.3,
  levelMultipliers: { Title: 1.0, H1: 1.0, H2: 0.9, H3: 0.8, Body: 0.7 },
  earlyPositionBoost: 0.05,
  personaTermRepeat: 3,
  personaMinScore: 0.5,
  topSections: 5,
  sentencesPerAnswer: 3,
  sentenceMinLength: 40,
  sentenceMaxLength: 300,
  sentencePositionBonus: 0.5,
  sentenceLengthPenalty: 1.0,
  timeBudgetMs: null,
  concurrency: 4,
};
