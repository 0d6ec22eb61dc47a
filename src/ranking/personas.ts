// src/ranking/personas.ts
// Persona profile resolver: nearest category by signature keywords, generic fallback.

import personaData from './data/personas.json';

export type PersonaCategory = 'researcher' | 'student' | 'analyst' | 'journalist' | 'business' | 'generic';

export type PersonaProfile = {
  category: PersonaCategory;
  // Prefix for the combined answer, e.g. "Analysis".
  answerLabel?: string;
  // Term -> relevance weight in (0, 1].
  weightedVocabulary: ReadonlyMap<string, number>;
};

export type PersonaTableEntry = {
  category: Exclude<PersonaCategory, 'generic'>;
  signature: readonly string[];
  vocabulary: ReadonlyMap<string, number>;
  answerLabel?: string;
};

export type PersonaTable = {
  categories: readonly PersonaTableEntry[];
  generic: readonly string[];
};

export type PersonaResolution = {
  profile: PersonaProfile;
  score: number;
  recognized: boolean;
};

export const GENERIC_WEIGHT = 0.2;

const NAMED_CATEGORIES: ReadonlyArray<PersonaTableEntry['category']> = [
  'researcher',
  'student',
  'analyst',
  'journalist',
  'business',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNamedCategory(value: unknown): value is PersonaTableEntry['category'] {
  return NAMED_CATEGORIES.some((c) => c === value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim().toLowerCase());
}

function weightMap(value: unknown): Map<string, number> {
  const out = new Map<string, number>();
  if (!isRecord(value)) return out;
  for (const [term, weight] of Object.entries(value)) {
    if (typeof weight !== 'number' || !(weight > 0)) continue;
    out.set(term.toLowerCase(), Math.min(1, weight));
  }
  return out;
}

/**
 * Reads a persona table from untrusted JSON. Unknown categories and non-positive
 * weights are dropped; weights above 1 are capped.
 */
export function parsePersonaTable(raw: unknown): PersonaTable {
  const source = isRecord(raw) ? raw : {};
  const categories: PersonaTableEntry[] = [];
  const entries: unknown[] = Array.isArray(source.categories) ? source.categories : [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const category = entry.category;
    if (!isNamedCategory(category) || categories.some((c) => c.category === category)) continue;
    const label = typeof entry.answerLabel === 'string' ? entry.answerLabel.trim() : '';
    categories.push({
      category,
      signature: stringList(entry.signature),
      vocabulary: weightMap(entry.vocabulary),
      ...(label ? { answerLabel: label } : {}),
    });
  }

  return { categories, generic: stringList(source.generic) };
}

export const DEFAULT_PERSONA_TABLE: PersonaTable = parsePersonaTable(personaData);

function wordsOf(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

// Whole-word hits count 1, substring-only hits ("researchers") count 0.5.
function signatureScore(text: string, signature: readonly string[]): number {
  const lower = text.toLowerCase();
  const words = wordsOf(text);
  let score = 0;
  for (const kw of signature) {
    if (words.has(kw)) score += 1;
    else if (lower.includes(kw)) score += 0.5;
  }
  return score;
}

export function genericProfile(table: PersonaTable = DEFAULT_PERSONA_TABLE): PersonaProfile {
  return {
    category: 'generic',
    weightedVocabulary: new Map(table.generic.map((t) => [t, GENERIC_WEIGHT])),
  };
}

/**
 * Maps a free-text role (and, at half weight, the job description) onto the closest
 * persona category. Anything scoring below `minScore` resolves to the generic profile.
 */
export function resolvePersona(
  role: string,
  job = '',
  opts: { minScore?: number; table?: PersonaTable } = {}
): PersonaResolution {
  const table = opts.table ?? DEFAULT_PERSONA_TABLE;
  const minScore = opts.minScore ?? 0.5;

  let best: PersonaTableEntry | null = null;
  let bestScore = 0;
  for (const entry of table.categories) {
    const score = signatureScore(role, entry.signature) + 0.5 * signatureScore(job, entry.signature);
    // Strictly greater: table order breaks ties.
    if (score > bestScore) {
      best = entry;
      bestScore = score;
    }
  }

  if (!best || bestScore < minScore) {
    return { profile: genericProfile(table), score: bestScore, recognized: false };
  }
  return {
    profile: { category: best.category, weightedVocabulary: best.vocabulary, answerLabel: best.answerLabel },
    score: bestScore,
    recognized: true,
  };
}
