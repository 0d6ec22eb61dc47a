// src/ranking/tokenize.ts
// Text tokenization: word terms for the vector space, sentences for answer synthesis.
//
// Both return restartable lazy sequences; every iteration re-reads the source string.

import nlp from 'compromise';

import stopwordList from './data/stopwords.json';

export interface Tokenizer {
  terms(text: string): Iterable<string>;
  sentences(text: string): Iterable<string>;
}

export const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);

const NUMERIC = /^\d+(?:[.,]\d+)?$/;

function restartable<T>(produce: () => Generator<T>): Iterable<T> {
  return { [Symbol.iterator]: produce };
}

function isKeptTerm(token: string): boolean {
  if (!token || STOP_WORDS.has(token)) return false;
  // Numbers are kept whole so figures and years can match.
  if (NUMERIC.test(token)) return true;
  return token.length > 1;
}

export function terms(text: string): Iterable<string> {
  return restartable(function* () {
    // Decimal points and thousands separators survive only between digits.
    const clean = text
      .toLowerCase()
      .replace(/(?<!\d)[.,]|[.,](?!\d)/g, ' ')
      .replace(/[^\p{L}\p{N}\s.,]+/gu, ' ');
    for (const token of clean.split(/\s+/)) {
      if (isKeptTerm(token)) yield token;
    }
  });
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function sentences(text: string): Iterable<string> {
  return restartable(function* () {
    if (!text.trim()) return;
    const out: unknown = nlp(text).sentences().out('array');
    const list = Array.isArray(out) ? out.filter(isString) : [];
    for (const s of list) {
      const trimmed = s.trim();
      if (trimmed) yield trimmed;
    }
  });
}

export function countTerms(tokens: Iterable<string>, into = new Map<string, number>(), weight = 1): Map<string, number> {
  for (const t of tokens) into.set(t, (into.get(t) ?? 0) + weight);
  return into;
}

export const defaultTokenizer: Tokenizer = { terms, sentences };
