import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { parseArgs } from 'node:util';

import { DocumentCollection, structureOnly } from './src/orchestrator';
import { extractDocument, loadPdfDocument, type DocumentInput, type TextFragmentInput } from './src/pdf';
import { validateSettings } from './src/services/settings-validator';
import type { OutlinerSettings } from './src/types';

const USAGE = `Usage:
  outline [--settings file.json] [--metrics] <input.pdf|input.json ...>
  rank --persona <role> --job <task> [--question <text>] [--limit <n>] [--settings file.json] <inputs ...>

JSON inputs hold { "documentId"?: string, "pages": [[{ text, fontSize, bold, top, page }]] }.`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPageList(value: unknown): value is TextFragmentInput[][] {
  return Array.isArray(value) && value.every((page) => Array.isArray(page) && page.every(isRecord));
}

function documentIdFor(path: string): string {
  return basename(path, extname(path));
}

async function readJsonDocument(path: string): Promise<DocumentInput> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  if (isRecord(parsed) && isPageList(parsed.pages)) {
    const documentId = typeof parsed.documentId === 'string' && parsed.documentId ? parsed.documentId : documentIdFor(path);
    return { documentId, pages: parsed.pages };
  }
  if (isPageList(parsed)) return { documentId: documentIdFor(path), pages: parsed };
  throw new Error(`${path}: expected { pages: [[fragment, ...], ...] }`);
}

async function readDocument(path: string): Promise<DocumentInput> {
  if (extname(path).toLowerCase() === '.pdf') {
    // PDF.js rejects Node Buffers; hand it a plain Uint8Array copy.
    const pdf = await loadPdfDocument(new Uint8Array(await readFile(path)));
    return extractDocument(pdf, documentIdFor(path));
  }
  return readJsonDocument(path);
}

async function readSettings(path: string | undefined): Promise<OutlinerSettings> {
  if (!path) return validateSettings({});
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return validateSettings(raw);
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) throw new Error(`--limit must be a non-negative integer, got "${raw}"`);
  return n;
}

async function run(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      persona: { type: 'string' },
      job: { type: 'string' },
      question: { type: 'string' },
      limit: { type: 'string' },
      settings: { type: 'string' },
      metrics: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...inputs] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return;
  }
  if (!inputs.length) throw new Error('no input documents given');

  const settings = await readSettings(values.settings);
  const documents = await Promise.all(inputs.map(readDocument));

  if (command === 'outline') {
    const result = await structureOnly(documents, settings);
    for (const issue of result.issues) console.warn('[Outliner][outline]', issue.kind, issue.documentId ?? '', issue.message);
    if (values.metrics) console.warn('[Outliner][metrics]', result.metrics);
    const byDocument = Object.fromEntries(result.documents.map(({ documentId, title, outline }) => [documentId, { title, outline }]));
    console.log(JSON.stringify(byDocument, null, 2));
    return;
  }

  if (command === 'rank') {
    if (!values.persona || !values.job) throw new Error('rank needs --persona and --job');
    const collection = await DocumentCollection.build(documents, settings);
    const output = collection.query({
      persona: values.persona,
      job: values.job,
      question: values.question,
      limit: parseLimit(values.limit),
    });
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  throw new Error(`unknown command "${command}"`);
}

run(process.argv.slice(2)).catch((err: unknown) => {
  console.error('[Outliner][cli] failed', err instanceof Error ? err.message : err);
  console.error(USAGE);
  process.exitCode = 1;
});
