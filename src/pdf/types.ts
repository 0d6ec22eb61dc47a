// src/pdf/types.ts
// Document-structure data model: positioned fragments in, outline and sections out.
// NOTE: Fragments are produced by an extraction collaborator (see extract.ts for the
// PDF.js adapter). Nothing downstream depends on how they were produced.

export type HeadingLevel = 'Title' | 'H1' | 'H2' | 'H3' | 'Body';

export type OutlineLevel = Exclude<HeadingLevel, 'Title' | 'Body'>;

// Depth used for nesting checks; Title is the root.
export const HEADING_DEPTH: Record<Exclude<HeadingLevel, 'Body'>, number> = {
  Title: 0,
  H1: 1,
  H2: 2,
  H3: 3,
};

export const OUTLINE_LEVELS: readonly OutlineLevel[] = ['H1', 'H2', 'H3'];

export type TextFragment = {
  readonly text: string;
  readonly fontSize: number;
  readonly bold: boolean;
  // Normalised [0..1], origin top-left.
  readonly top: number;
  readonly page: number;
  readonly documentId: string;
};

// Shape accepted from the extraction collaborator. Values are untrusted until sanitised.
export type TextFragmentInput = {
  text?: unknown;
  fontSize?: unknown;
  bold?: unknown;
  top?: unknown;
  page?: unknown;
};

export type DocumentInput = {
  documentId: string;
  // Ordered pages, each an ordered sequence of fragments.
  pages: ReadonlyArray<ReadonlyArray<TextFragmentInput>>;
};

export type FontStats = {
  median: number;
  p75: number;
  p90: number;
};

export type FragmentScore = {
  sizeTier: 0 | 1 | 2 | 3;
  styleBonus: 0 | 1;
  patternBonus: 0 | 1;
  positionBonus: 0 | 1;
  total: number;
  // False when the length gate fails or the fragment has no intrinsic heading signal.
  eligible: boolean;
};

export type ClassifiedFragment = {
  fragment: TextFragment;
  score: FragmentScore;
  level: HeadingLevel;
};

export type OutlineEntry = {
  level: OutlineLevel;
  text: string;
  page: number;
};

export type Section = {
  readonly documentId: string;
  readonly sectionTitle: string;
  readonly startPage: number;
  readonly endPage: number;
  readonly bodyText: string;
  readonly headingLevel: HeadingLevel;
  // 0-based position of the section within its document.
  readonly ordinal: number;
};

export type ExclusionReason = 'EMPTY' | 'HEADER_FOOTER';

export type ExclusionLogEntry = {
  page: number;
  reason: ExclusionReason;
  excerpt: string;
};

export type StructureResult = {
  title: string;
  outline: OutlineEntry[];
  fragments: ClassifiedFragment[];
};

export type DocumentStructure = {
  documentId: string;
  title: string;
  outline: OutlineEntry[];
  sections: Section[];
  exclusions: ExclusionLogEntry[];
};

// Structure-only output per document.
export type OutlineOutput = {
  title: string;
  outline: OutlineEntry[];
};
