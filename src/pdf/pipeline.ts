// src/pdf/pipeline.ts
// Entry-point: positioned fragments → normalised lines → outline → sections.

import type { DocumentInput, DocumentStructure, OutlineOutput } from './types';
import type { OutlinerSettings } from '../types';
import { createIssue, type ProcessingIssue } from '../services/issues';
import { normalizeDocument } from './lines';
import { computeFontStats, detectStructure } from './headings';
import { assembleSections } from './sections';

export type DocumentStructureResult = {
  structure: DocumentStructure;
  issues: ProcessingIssue[];
};

export function buildDocumentStructure(doc: DocumentInput, settings: OutlinerSettings): DocumentStructureResult {
  const normalized = normalizeDocument(doc, settings);
  const issues = normalized.issues.slice();

  if (!normalized.fragments.length) {
    issues.push(createIssue('EmptyInput', 'document has no usable text', { documentId: doc.documentId }));
    return {
      structure: {
        documentId: doc.documentId,
        title: doc.documentId,
        outline: [],
        sections: [],
        exclusions: normalized.exclusions,
      },
      issues,
    };
  }

  // Font statistics are taken per line, before merging.
  const stats = computeFontStats(normalized.lines);
  const detected = detectStructure(normalized.fragments, doc.documentId, settings, stats);
  if (!detected.fragments.some((c) => c.level !== 'Body')) {
    issues.push(createIssue('NoHeadingsDetected', 'document treated as a single section', { documentId: doc.documentId }));
  }

  const sections = assembleSections(detected.fragments, doc.documentId, detected.title);

  return {
    structure: {
      documentId: doc.documentId,
      title: detected.title,
      outline: detected.outline,
      sections,
      exclusions: normalized.exclusions,
    },
    issues,
  };
}

export function toOutlineOutput(structure: DocumentStructure): OutlineOutput {
  return {
    title: structure.title,
    outline: structure.outline.map((e) => ({ level: e.level, text: e.text, page: e.page })),
  };
}
