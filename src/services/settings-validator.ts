/**
 * SettingsValidator - Validates and sanitizes outliner settings
 *
 * PURPOSE
 * ───────
 * Ensures settings loaded from a JSON file (or passed by a caller) are valid and
 * within acceptable ranges. Bad or missing values never abort a run.
 *
 * KEY RESPONSIBILITIES
 * ────────────────────
 * - Validate numeric ranges (gaps, ratios, weights, counts)
 * - Apply default values for missing properties
 * - Clamp out-of-range values instead of rejecting them
 *
 * USAGE
 * ─────
 * ```typescript
 * const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
 * const settings = validateSettings(raw);
 * ```
 */

import type { HeadingLevel } from '../pdf/types';
import { DEFAULT_SETTINGS, type OutlinerSettings } from '../types';

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  mergeGap: { min: 0, max: 0.2 },
  ratio: { min: 0, max: 1 },
  headingLength: { min: 1, max: 500 },
  pageWindow: { min: 0, max: 50 },
  weight: { min: 0, max: 1 },
  multiplier: { min: 0, max: 2 },
  personaTermRepeat: { min: 0, max: 20 },
  personaMinScore: { min: 0, max: 10 },
  topSections: { min: 0, max: 100 },
  sentencesPerAnswer: { min: 1, max: 20 },
  sentenceLength: { min: 0, max: 5000 },
  sentenceBonus: { min: 0, max: 10 },
  timeBudgetMs: { min: 0, max: 3_600_000 },
  concurrency: { min: 1, max: 64 },
} as const;

const LEVELS: readonly HeadingLevel[] = ['Title', 'H1', 'H2', 'H3', 'Body'];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a number and clamps it to the specified range
 */
function validateNumber(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return defaultValue;
  }
  return clamp(value, min, max);
}

function validateInteger(value: unknown, defaultValue: number, min: number, max: number): number {
  return Math.round(validateNumber(value, defaultValue, min, max));
}

/**
 * Validates a nullable number. `null` is kept, anything else non-numeric falls back.
 */
function validateOptionalNumber(
  value: unknown,
  defaultValue: number | null,
  min: number,
  max: number
): number | null {
  if (value === null) return null;
  if (typeof value !== 'number' || !Number.isFinite(value)) return defaultValue;
  return clamp(value, min, max);
}

function validateMultipliers(value: unknown): Record<HeadingLevel, number> {
  const defaults = DEFAULT_SETTINGS.levelMultipliers;
  const source = isRecord(value) ? value : {};
  const out: Record<HeadingLevel, number> = { ...defaults };
  for (const level of LEVELS) {
    out[level] = validateNumber(source[level], defaults[level], LIMITS.multiplier.min, LIMITS.multiplier.max);
  }
  return out;
}

/**
 * Validates and sanitizes outliner settings
 *
 * @param raw - Partial settings object, typically parsed from a JSON file
 * @returns Fully valid OutlinerSettings with defaults applied
 */
export function validateSettings(raw: unknown): OutlinerSettings {
  if (!isRecord(raw)) {
    return { ...DEFAULT_SETTINGS, levelMultipliers: { ...DEFAULT_SETTINGS.levelMultipliers } };
  }

  const d = DEFAULT_SETTINGS;
  const minHeadingLength = validateInteger(raw.minHeadingLength, d.minHeadingLength, LIMITS.headingLength.min, LIMITS.headingLength.max);
  const sentenceMinLength = validateInteger(raw.sentenceMinLength, d.sentenceMinLength, LIMITS.sentenceLength.min, LIMITS.sentenceLength.max);

  return {
    mergeGap: validateNumber(raw.mergeGap, d.mergeGap, LIMITS.mergeGap.min, LIMITS.mergeGap.max),
    repeatPageRatio: validateNumber(raw.repeatPageRatio, d.repeatPageRatio, LIMITS.ratio.min, LIMITS.ratio.max),
    headerFooterBand: validateNumber(raw.headerFooterBand, d.headerFooterBand, 0, 0.5),

    minHeadingLength,
    // Window must stay non-empty.
    maxHeadingLength: Math.max(
      minHeadingLength,
      validateInteger(raw.maxHeadingLength, d.maxHeadingLength, LIMITS.headingLength.min, LIMITS.headingLength.max)
    ),
    positionBand: validateNumber(raw.positionBand, d.positionBand, LIMITS.ratio.min, LIMITS.ratio.max),
    duplicatePageWindow: validateInteger(raw.duplicatePageWindow, d.duplicatePageWindow, LIMITS.pageWindow.min, LIMITS.pageWindow.max),

    cosineWeight: validateNumber(raw.cosineWeight, d.cosineWeight, LIMITS.weight.min, LIMITS.weight.max),
    personaWeight: validateNumber(raw.personaWeight, d.personaWeight, LIMITS.weight.min, LIMITS.weight.max),
    levelMultipliers: validateMultipliers(raw.levelMultipliers),
    earlyPositionBoost: validateNumber(raw.earlyPositionBoost, d.earlyPositionBoost, LIMITS.weight.min, LIMITS.weight.max),
    personaTermRepeat: validateNumber(raw.personaTermRepeat, d.personaTermRepeat, LIMITS.personaTermRepeat.min, LIMITS.personaTermRepeat.max),
    personaMinScore: validateNumber(raw.personaMinScore, d.personaMinScore, LIMITS.personaMinScore.min, LIMITS.personaMinScore.max),

    topSections: validateInteger(raw.topSections, d.topSections, LIMITS.topSections.min, LIMITS.topSections.max),
    sentencesPerAnswer: validateInteger(raw.sentencesPerAnswer, d.sentencesPerAnswer, LIMITS.sentencesPerAnswer.min, LIMITS.sentencesPerAnswer.max),
    sentenceMinLength,
    sentenceMaxLength: Math.max(
      sentenceMinLength,
      validateInteger(raw.sentenceMaxLength, d.sentenceMaxLength, LIMITS.sentenceLength.min, LIMITS.sentenceLength.max)
    ),
    sentencePositionBonus: validateNumber(raw.sentencePositionBonus, d.sentencePositionBonus, LIMITS.sentenceBonus.min, LIMITS.sentenceBonus.max),
    sentenceLengthPenalty: validateNumber(raw.sentenceLengthPenalty, d.sentenceLengthPenalty, LIMITS.sentenceBonus.min, LIMITS.sentenceBonus.max),

    timeBudgetMs: validateOptionalNumber(raw.timeBudgetMs, d.timeBudgetMs, LIMITS.timeBudgetMs.min, LIMITS.timeBudgetMs.max),
    concurrency: validateInteger(raw.concurrency, d.concurrency, LIMITS.concurrency.min, LIMITS.concurrency.max),
  };
}
