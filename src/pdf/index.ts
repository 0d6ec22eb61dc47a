// src/pdf/index.ts
// Public entrypoints for the document-structure pipeline.

export type {
  ClassifiedFragment,
  DocumentInput,
  DocumentStructure,
  ExclusionLogEntry,
  HeadingLevel,
  OutlineEntry,
  OutlineLevel,
  OutlineOutput,
  Section,
  TextFragment,
  TextFragmentInput,
} from './types';

export { buildDocumentStructure, toOutlineOutput } from './pipeline';
export { normalizeDocument } from './lines';
export { detectStructure } from './headings';
export { assembleSections } from './sections';

// PDF.js adapter (PDF bytes -> DocumentInput).
export type { PdfDocLike, PdfPageLike } from './extract';
export { extractDocument, loadPdfDocument } from './extract';
