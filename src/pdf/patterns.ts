// src/pdf/patterns.ts
// Heading-shape text patterns. Shape only: numbering, labelled divisions, short caps.

// "1. Scope", "2.3 Results", "4.1.2. Limits"
const NUMBERED = /^\d{1,3}(?:\.\d{1,3})*\.\s+\S|^\d{1,3}(?:\.\d{1,3})+\s+\S/;

// "Chapter 3", "SECTION IV", "Part 2: Setup", "Appendix A"
const LABELLED = /^(?:chapter|section|part|appendix)\s+(?:\d+|[ivxlc]+|[a-z])\b/i;

// "IV. Discussion"
const ROMAN = /^[IVXLC]{1,6}\.\s+\S/;

const CANONICAL = /^(?:abstract|introduction|background|summary|executive summary|overview|conclusions?|discussion|results|methods|methodology|references|bibliography|acknowledge?ments|appendix|table of contents|revision history)$/i;

const ALL_CAPS_MAX_LENGTH = 40;

/** True when the text opens with section numbering ("1.", "1.2", "IV.", "Chapter 3"). */
export function hasNumberingPrefix(text: string): boolean {
  const t = text.trim();
  return NUMBERED.test(t) || LABELLED.test(t) || ROMAN.test(t);
}

function isShortAllCaps(text: string): boolean {
  if (text.length > ALL_CAPS_MAX_LENGTH) return false;
  const letters = text.match(/\p{L}/gu) ?? [];
  if (letters.length < 2) return false;
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

export function matchesHeadingShape(text: string): boolean {
  const t = text.trim();
  if (!t) return false;
  return hasNumberingPrefix(t) || CANONICAL.test(t.replace(/[:.]$/, '')) || isShortAllCaps(t);
}

// Lines that sit where a title would but are front matter: preprint stamps, page
// labels, addresses, keyword lists.
const NON_TITLE = [
  /^draft\s+version\b/i,
  /^typeset\s+using\b/i,
  /^arxiv:\d/i,
  /^\d+\s+[a-z]/,
  /^abstract$/i,
  /^keywords:/i,
  /^[a-z][^@\s]*@\S+\.[a-z]/i,
  /^page\s+\d+/i,
  /^www\./i,
];

const NON_TITLE_WORDS = /\b(?:arxiv|preprint|submitted|received|accepted)\b/i;

const SHORT_CODE = /^[A-Z0-9#\s-]+$/;

export function isNonTitleText(text: string): boolean {
  const t = text.trim();
  if (NON_TITLE.some((re) => re.test(t)) || NON_TITLE_WORDS.test(t)) return true;
  return t.length < 5 && SHORT_CODE.test(t);
}

const TITLE_PREFIXES = [
  /^arxiv:\d+\.\d+v\d+\s+\[[^\]]+\]\s+\d+\s+[a-z]+\s+\d+\s*/i,
  /^draft\s+version[\s:.-]*/i,
  /^preprint[\s:.-]*/i,
];

/** Strips stamp prefixes ("Draft version", "Preprint:", arXiv identifiers) from a title line. */
export function cleanTitle(text: string): string {
  let t = text.trim();
  for (const re of TITLE_PREFIXES) t = t.replace(re, '');
  return t.trim();
}
