// src/orchestrator.ts
// Two-phase pipeline: per-document structuring in parallel, then one immutable index
// that any number of persona queries read concurrently.

import pLimit from 'p-limit';

import { DEFAULT_SETTINGS, type OutlinerSettings } from './types';
import { buildDocumentStructure, toOutlineOutput, type DocumentInput, type DocumentStructure, type OutlineOutput } from './pdf';
import { createIssue, issueFromError, type ProcessingIssue } from './services/issues';
import { Deadline, type Clock } from './services/deadline';
import {
  SectionIndex,
  composeAnswer,
  rankSections,
  resolvePersona,
  synthesizeAnswers,
  type PersonaCategory,
  type PersonaTable,
  type SynthesisResult,
  type Tokenizer,
} from './ranking';

export type OrchestratorOptions = {
  clock?: Clock;
  now?: () => Date;
  personaTable?: PersonaTable;
  tokenizer?: Tokenizer;
};

export type QueryRequest = {
  persona: string;
  job: string;
  question?: string;
  limit?: number;
};

export type ExtractedSection = {
  document: string;
  page: number;
  sectionTitle: string;
  importanceRank: number;
};

export type SubsectionAnalysis = {
  document: string;
  sectionTitle: string;
  refinedText: string;
  page: number;
};

// Counts for one structure phase. Timings come from the injected clock.
export type BuildMetrics = {
  documentsProcessed: number;
  documentsFailed: number;
  fragmentsExcluded: number;
  headingsDetected: number;
  sectionsExtracted: number;
  buildMs: number;
};

export type QueryMetrics = BuildMetrics & { queryMs: number };

export type PersonaRankingOutput = {
  metadata: {
    inputDocuments: string[];
    persona: string;
    personaCategory: PersonaCategory;
    jobToBeDone: string;
    processingTimestamp: string;
  };
  extractedSections: ExtractedSection[];
  subsectionAnalysis: SubsectionAnalysis[];
  answer: string;
  // Score of the top-ranked section, 0 when nothing ranked.
  confidence: number;
  truncated: boolean;
  issues: ProcessingIssue[];
  metrics: QueryMetrics;
};

export type StructureOnlyOutput = {
  documents: Array<OutlineOutput & { documentId: string }>;
  issues: ProcessingIssue[];
  metrics: BuildMetrics;
};

type Snapshot = {
  readonly structures: readonly DocumentStructure[];
  readonly index: SectionIndex;
  readonly issues: readonly ProcessingIssue[];
  readonly metrics: BuildMetrics;
};

type StructurePhase = {
  structures: DocumentStructure[];
  issues: ProcessingIssue[];
  metrics: BuildMetrics;
};

function emptyStructure(documentId: string): DocumentStructure {
  return { documentId, title: documentId, outline: [], sections: [], exclusions: [] };
}

/**
 * Runs the structure phase for every document with bounded parallelism. A document
 * that throws is logged and contributes an empty structure; the others still finish.
 * Results keep input order.
 */
export async function buildStructures(
  documents: readonly DocumentInput[],
  settings: OutlinerSettings,
  clock: Clock = Date.now
): Promise<StructurePhase> {
  const startedAt = clock();
  const limit = pLimit(Math.max(1, settings.concurrency));
  const results = await Promise.all(
    documents.map((doc) =>
      limit(async () => {
        try {
          return buildDocumentStructure(doc, settings);
        } catch (err) {
          console.warn('[Outliner][pipeline] document failed, continuing without it', { documentId: doc.documentId, err });
          return {
            structure: emptyStructure(doc.documentId),
            issues: [issueFromError('DocumentFailed', err, doc.documentId)],
          };
        }
      })
    )
  );

  const structures = results.map((r) => r.structure);
  const issues = results.flatMap((r) => r.issues);
  return {
    structures,
    issues,
    metrics: {
      documentsProcessed: structures.length,
      documentsFailed: issues.filter((i) => i.kind === 'DocumentFailed').length,
      fragmentsExcluded: structures.reduce((n, s) => n + s.exclusions.length, 0),
      headingsDetected: structures.reduce((n, s) => n + s.outline.length, 0),
      sectionsExtracted: structures.reduce((n, s) => n + s.sections.length, 0),
      buildMs: clock() - startedAt,
    },
  };
}

export async function structureOnly(
  documents: readonly DocumentInput[],
  settings: OutlinerSettings = DEFAULT_SETTINGS,
  options: Pick<OrchestratorOptions, 'clock'> = {}
): Promise<StructureOnlyOutput> {
  const { structures, issues, metrics } = await buildStructures(documents, settings, options.clock);
  return {
    documents: structures.map((s) => ({ documentId: s.documentId, ...toOutlineOutput(s) })),
    issues,
    metrics,
  };
}

async function buildSnapshot(
  documents: readonly DocumentInput[],
  settings: OutlinerSettings,
  options: OrchestratorOptions
): Promise<Snapshot> {
  const { structures, issues, metrics } = await buildStructures(documents, settings, options.clock);
  const sections = structures.flatMap((s) => s.sections);
  return Object.freeze({
    structures: Object.freeze(structures),
    index: SectionIndex.build(sections, options.tokenizer),
    issues: Object.freeze(issues),
    metrics: Object.freeze(metrics),
  });
}

/**
 * A structured, indexed document collection. Queries never mutate it; `rebuild`
 * prepares a complete replacement before swapping it in.
 */
export class DocumentCollection {
  private snapshot: Snapshot;
  private rebuilding: Promise<void> = Promise.resolve();

  private constructor(
    snapshot: Snapshot,
    private readonly settings: OutlinerSettings,
    private readonly options: OrchestratorOptions
  ) {
    this.snapshot = snapshot;
  }

  static async build(
    documents: readonly DocumentInput[],
    settings: OutlinerSettings = DEFAULT_SETTINGS,
    options: OrchestratorOptions = {}
  ): Promise<DocumentCollection> {
    const snapshot = await buildSnapshot(documents, settings, options);
    return new DocumentCollection(snapshot, settings, options);
  }

  get structures(): readonly DocumentStructure[] {
    return this.snapshot.structures;
  }

  get index(): SectionIndex {
    return this.snapshot.index;
  }

  get issues(): readonly ProcessingIssue[] {
    return this.snapshot.issues;
  }

  get metrics(): BuildMetrics {
    return this.snapshot.metrics;
  }

  /** Rebuilds run one at a time; each resolves once its snapshot is live. */
  rebuild(documents: readonly DocumentInput[]): Promise<void> {
    const next = this.rebuilding.then(async () => {
      this.snapshot = await buildSnapshot(documents, this.settings, this.options);
    });
    // A failed rebuild rejects for its caller only; the queue keeps going.
    this.rebuilding = next.catch((err: unknown) => {
      console.warn('[Outliner][rebuild] rebuild failed, keeping previous index', { err });
    });
    return next;
  }

  query(request: QueryRequest): PersonaRankingOutput {
    // One snapshot for the whole query, even if a rebuild lands meanwhile.
    const snapshot = this.snapshot;
    const { settings } = this;
    const deadline = new Deadline(settings.timeBudgetMs, this.options.clock);
    const issues: ProcessingIssue[] = snapshot.issues.slice();

    const persona = resolvePersona(request.persona, request.job, {
      minScore: settings.personaMinScore,
      table: this.options.personaTable,
    });
    if (!persona.recognized) {
      issues.push(createIssue('UnrecognizedPersona', `no persona category matches "${request.persona}", using generic`));
    }

    const rankingQuery = { job: request.job, question: request.question, profile: persona.profile };
    const ranking = rankSections(snapshot.index, rankingQuery, settings, deadline);
    issues.push(...ranking.issues);

    const limit = request.limit !== undefined && request.limit >= 0 ? Math.floor(request.limit) : ranking.ranked.length;
    const listed = ranking.ranked.slice(0, limit);

    // Answers are skipped entirely once ranking itself ran out of time.
    const synthesis: SynthesisResult = ranking.truncated
      ? { answers: [], truncated: true }
      : synthesizeAnswers(snapshot.index, listed, ranking.queryVector, settings, deadline);

    const truncated = ranking.truncated || synthesis.truncated;
    if (truncated) {
      issues.push(createIssue('DeadlineExceeded', 'time budget exhausted, returning partial result', {
        detail: { budgetMs: settings.timeBudgetMs, answered: synthesis.answers.length },
      }));
    }

    const subsectionAnalysis = synthesis.answers.map((a) => ({
      document: a.documentId,
      sectionTitle: a.sectionTitle,
      refinedText: a.refinedText,
      page: a.page,
    }));

    const now = this.options.now?.() ?? new Date();
    return {
      metadata: {
        inputDocuments: snapshot.structures.map((s) => s.documentId),
        persona: request.persona,
        personaCategory: persona.profile.category,
        jobToBeDone: request.job,
        processingTimestamp: now.toISOString(),
      },
      extractedSections: listed.map((r) => ({
        document: r.section.documentId,
        page: r.section.startPage,
        sectionTitle: r.section.sectionTitle,
        importanceRank: r.importanceRank,
      })),
      subsectionAnalysis,
      answer: composeAnswer(synthesis.answers, persona.profile.answerLabel),
      confidence: ranking.ranked[0]?.score ?? 0,
      truncated,
      issues,
      metrics: { ...snapshot.metrics, queryMs: deadline.elapsedMs() },
    };
  }
}
