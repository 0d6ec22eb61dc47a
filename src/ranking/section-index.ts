// src/ranking/section-index.ts
// Corpus-wide TF-IDF space over sections. Built once, then shared read-only by queries.

import type { Section } from '../pdf/types';
import { countTerms, defaultTokenizer, type Tokenizer } from './tokenize';

export type WeightedVector = {
  readonly weights: ReadonlyMap<string, number>;
  readonly norm: number;
};

export type IndexedSection = WeightedVector & {
  readonly section: Section;
  readonly termCounts: ReadonlyMap<string, number>;
  // Position of the section's document in corpus order.
  readonly documentOrder: number;
  // Number of sections the section's document contributed.
  readonly documentSectionCount: number;
};

function l2(weights: ReadonlyMap<string, number>): number {
  let sum = 0;
  for (const w of weights.values()) sum += w * w;
  return Math.sqrt(sum);
}

export class SectionIndex {
  private constructor(
    readonly entries: readonly IndexedSection[],
    private readonly idfByTerm: ReadonlyMap<string, number>,
    readonly tokenizer: Tokenizer
  ) {
    Object.freeze(this);
  }

  /**
   * Builds the vector space with one section as the IDF document unit. Title terms
   * only count for sections that have body text, so an empty section stays empty.
   */
  static build(sections: readonly Section[], tokenizer: Tokenizer = defaultTokenizer): SectionIndex {
    const counts = sections.map((s) => {
      const tf = countTerms(tokenizer.terms(s.bodyText));
      if (tf.size) countTerms(tokenizer.terms(s.sectionTitle), tf);
      return tf;
    });

    const df = new Map<string, number>();
    for (const tf of counts) {
      for (const term of tf.keys()) df.set(term, (df.get(term) ?? 0) + 1);
    }

    const n = sections.length;
    const idfByTerm = new Map<string, number>();
    for (const [term, d] of df) idfByTerm.set(term, Math.log((1 + n) / (1 + d)) + 1);

    const documentOrder = new Map<string, number>();
    const sectionsPerDocument = new Map<string, number>();
    for (const s of sections) {
      if (!documentOrder.has(s.documentId)) documentOrder.set(s.documentId, documentOrder.size);
      sectionsPerDocument.set(s.documentId, (sectionsPerDocument.get(s.documentId) ?? 0) + 1);
    }

    const entries = sections.map((section, idx): IndexedSection => {
      const termCounts = counts[idx];
      const weights = new Map<string, number>();
      for (const [term, tf] of termCounts) weights.set(term, tf * (idfByTerm.get(term) ?? 0));
      return Object.freeze({
        section,
        termCounts,
        weights,
        norm: l2(weights),
        documentOrder: documentOrder.get(section.documentId) ?? 0,
        documentSectionCount: sectionsPerDocument.get(section.documentId) ?? 1,
      });
    });

    return new SectionIndex(Object.freeze(entries), idfByTerm, tokenizer);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Smoothed IDF; a term the corpus never saw gets the maximum. */
  idf(term: string): number {
    return this.idfByTerm.get(term) ?? Math.log(1 + this.entries.length) + 1;
  }

  /** TF-IDF weights for a bag of term counts against this corpus. */
  weigh(termCounts: ReadonlyMap<string, number>): WeightedVector {
    const weights = new Map<string, number>();
    for (const [term, tf] of termCounts) {
      if (tf > 0) weights.set(term, tf * this.idf(term));
    }
    return { weights, norm: l2(weights) };
  }
}

export function cosine(a: WeightedVector, b: WeightedVector): number {
  if (!(a.norm > 0) || !(b.norm > 0)) return 0;
  const [small, large] = a.weights.size <= b.weights.size ? [a.weights, b.weights] : [b.weights, a.weights];
  let dot = 0;
  for (const [term, w] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += w * other;
  }
  return dot / (a.norm * b.norm);
}
