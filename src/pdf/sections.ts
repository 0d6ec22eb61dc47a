// src/pdf/sections.ts
// Section assembler: every heading opens a section that owns the body text after it.

import type { ClassifiedFragment, HeadingLevel, Section } from './types';

type OpenSection = {
  sectionTitle: string;
  headingLevel: HeadingLevel;
  startPage: number;
  endPage: number;
  body: string[];
};

/**
 * Groups classified fragments into non-overlapping sections covering the document.
 * Body text ahead of the first heading forms an implicit section named after the
 * document; a document without headings becomes exactly one such section.
 */
export function assembleSections(
  fragments: readonly ClassifiedFragment[],
  documentId: string,
  documentTitle: string
): Section[] {
  const sections: Section[] = [];
  let current: OpenSection | null = null;

  const close = () => {
    if (!current) return;
    // The implicit leading section exists only when it holds text.
    const implicit = current.headingLevel === 'Body';
    if (!implicit || current.body.length) {
      sections.push({
        documentId,
        sectionTitle: current.sectionTitle,
        startPage: current.startPage,
        endPage: Math.max(current.startPage, current.endPage),
        bodyText: current.body.join(' '),
        headingLevel: current.headingLevel,
        ordinal: sections.length,
      });
    }
    current = null;
  };

  for (const { fragment, level } of fragments) {
    if (level !== 'Body') {
      close();
      current = {
        sectionTitle: fragment.text,
        headingLevel: level,
        startPage: fragment.page,
        endPage: fragment.page,
        body: [],
      };
      continue;
    }

    if (!current) {
      current = {
        sectionTitle: documentTitle,
        headingLevel: 'Body',
        startPage: fragment.page,
        endPage: fragment.page,
        body: [],
      };
    }
    current.body.push(fragment.text);
    current.endPage = Math.max(current.endPage, fragment.page);
  }
  close();

  return sections;
}
