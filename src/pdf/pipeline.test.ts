import { describe, it, expect } from 'vitest';
import { buildDocumentStructure, toOutlineOutput } from './pipeline';
import type { DocumentInput } from './types';
import { DEFAULT_SETTINGS } from '../types';

const plainDoc: DocumentInput = {
  documentId: 'memo',
  pages: [
    [
      { text: 'the meeting moved to friday', fontSize: 10, bold: false, top: 0.2, page: 1 },
      { text: 'bring the quarterly figures', fontSize: 10, bold: false, top: 0.5, page: 1 },
    ],
  ],
};

const headedDoc: DocumentInput = {
  documentId: 'brief',
  pages: [
    [
      { text: 'Market Brief', fontSize: 22, bold: true, top: 0.05, page: 1 },
      { text: 'Prices rose in spring.', fontSize: 10, bold: false, top: 0.2, page: 1 },
      { text: '1. Demand', fontSize: 16, bold: true, top: 0.4, page: 1 },
      { text: 'Demand stayed firm.', fontSize: 10, bold: false, top: 0.5, page: 1 },
    ],
    [
      { text: '2. Supply', fontSize: 16, bold: true, top: 0.1, page: 2 },
      { text: 'Supply lagged behind.', fontSize: 10, bold: false, top: 0.2, page: 2 },
    ],
  ],
};

function paragraph(lines: string[], top: number, page: number) {
  return lines.map((text, i) => ({ text, fontSize: 10, bold: false, top: top + i * 0.02, page }));
}

// Four 14pt plain headings over three-line 10pt paragraphs.
const reportDoc: DocumentInput = {
  documentId: 'report',
  pages: [
    [
      { text: 'Annual Report', fontSize: 20, bold: true, top: 0.05, page: 1 },
      { text: 'Revenue Review', fontSize: 14, bold: false, top: 0.4, page: 1 },
      ...paragraph(['sales grew in every region', 'with the north leading', 'and margins held steady'], 0.45, 1),
      { text: 'Cost Review', fontSize: 14, bold: false, top: 0.6, page: 1 },
      ...paragraph(['freight costs fell slightly', 'while wages rose modestly', 'so totals were flat'], 0.65, 1),
    ],
    [
      { text: 'Staffing Plans', fontSize: 14, bold: false, top: 0.4, page: 2 },
      ...paragraph(['two teams will grow', 'as new sites open', 'over the coming year'], 0.45, 2),
      { text: 'Future Outlook', fontSize: 14, bold: false, top: 0.6, page: 2 },
      ...paragraph(['demand should stay firm', 'though prices may ease', 'in the second half'], 0.65, 2),
    ],
  ],
};

describe('buildDocumentStructure', () => {
  it('finds plain larger headings above multi-line paragraphs', () => {
    const { structure, issues } = buildDocumentStructure(reportDoc, DEFAULT_SETTINGS);
    expect(issues).toEqual([]);
    expect(toOutlineOutput(structure)).toEqual({
      title: 'Annual Report',
      outline: [
        { level: 'H1', text: 'Revenue Review', page: 1 },
        { level: 'H1', text: 'Cost Review', page: 1 },
        { level: 'H1', text: 'Staffing Plans', page: 2 },
        { level: 'H1', text: 'Future Outlook', page: 2 },
      ],
    });
    expect(structure.sections).toHaveLength(5);
    expect(structure.sections[1].bodyText).toBe('sales grew in every region with the north leading and margins held steady');
  });

  it('detects a body-sized canonical heading directly above its paragraph', () => {
    const doc: DocumentInput = {
      documentId: 'plant',
      pages: [
        [
          { text: 'the plant ran all year', fontSize: 10, bold: false, top: 0.2, page: 1 },
          { text: 'RESULTS', fontSize: 10, bold: false, top: 0.5, page: 1 },
          { text: 'output doubled since spring', fontSize: 10, bold: false, top: 0.518, page: 1 },
        ],
      ],
    };
    const { structure } = buildDocumentStructure(doc, DEFAULT_SETTINGS);
    expect(structure.outline).toEqual([{ level: 'H1', text: 'RESULTS', page: 1 }]);
    expect(structure.sections.map((s) => [s.sectionTitle, s.bodyText])).toEqual([
      ['plant', 'the plant ran all year'],
      ['RESULTS', 'output doubled since spring'],
    ]);
  });

  it('skips front-matter stamps when choosing the title and strips title prefixes', () => {
    const doc: DocumentInput = {
      documentId: 'paper',
      pages: [
        [
          { text: 'Submitted to the spring review board', fontSize: 20, bold: true, top: 0.02, page: 1 },
          { text: 'Draft version: Soil Moisture Trends', fontSize: 18, bold: true, top: 0.08, page: 1 },
          { text: 'moisture was sampled weekly', fontSize: 10, bold: false, top: 0.5, page: 1 },
        ],
      ],
    };
    const { structure } = buildDocumentStructure(doc, DEFAULT_SETTINGS);
    expect(structure.title).toBe('Soil Moisture Trends');
    expect(structure.sections.map((s) => s.sectionTitle)).toEqual([
      'Submitted to the spring review board',
      'Soil Moisture Trends',
    ]);
  });

  it('keeps a non-empty title and an empty outline for documents without headings', () => {
    const { structure, issues } = buildDocumentStructure(plainDoc, DEFAULT_SETTINGS);
    expect(toOutlineOutput(structure)).toEqual({ title: 'memo', outline: [] });
    expect(issues.map((i) => i.kind)).toEqual(['NoHeadingsDetected']);
    expect(structure.sections).toEqual([
      {
        documentId: 'memo',
        sectionTitle: 'memo',
        startPage: 1,
        endPage: 1,
        bodyText: 'the meeting moved to friday bring the quarterly figures',
        headingLevel: 'Body',
        ordinal: 0,
      },
    ]);
  });

  it('reports empty input and falls back to the document id', () => {
    const { structure, issues } = buildDocumentStructure({ documentId: 'blank', pages: [[], []] }, DEFAULT_SETTINGS);
    expect(structure.title).toBe('blank');
    expect(structure.outline).toEqual([]);
    expect(structure.sections).toEqual([]);
    expect(issues.map((i) => i.kind)).toEqual(['EmptyInput']);
  });

  it('produces title, outline and sections for a headed document', () => {
    const { structure, issues } = buildDocumentStructure(headedDoc, DEFAULT_SETTINGS);
    expect(issues).toEqual([]);
    expect(toOutlineOutput(structure)).toEqual({
      title: 'Market Brief',
      outline: [
        { level: 'H1', text: '1. Demand', page: 1 },
        { level: 'H1', text: '2. Supply', page: 2 },
      ],
    });
    expect(structure.sections.map((s) => [s.sectionTitle, s.headingLevel, s.bodyText])).toEqual([
      ['Market Brief', 'Title', 'Prices rose in spring.'],
      ['1. Demand', 'H1', 'Demand stayed firm.'],
      ['2. Supply', 'H1', 'Supply lagged behind.'],
    ]);
  });

  it('is deterministic for identical input', () => {
    const a = buildDocumentStructure(headedDoc, DEFAULT_SETTINGS);
    const b = buildDocumentStructure(headedDoc, DEFAULT_SETTINGS);
    expect(JSON.stringify(b)).toBe(JSON.stringify(a));
  });
});
