// Non-fatal processing issues. Every kind here is recovered from; none is thrown.

export type IssueKind =
  | 'EmptyInput'
  | 'NoHeadingsDetected'
  | 'UnrecognizedPersona'
  | 'EmptyCorpus'
  | 'DeadlineExceeded'
  | 'MalformedFragment'
  | 'DocumentFailed';

export type ProcessingIssue = {
  kind: IssueKind;
  message: string;
  documentId?: string;
  detail?: unknown;
};

function truncateString(value: string, max = 300): string {
  if (value.length <= max) return value;
  return value.slice(0, max) + '…';
}

export function createIssue(
  kind: IssueKind,
  message: string,
  opts?: { documentId?: string; detail?: unknown }
): ProcessingIssue {
  const issue: ProcessingIssue = { kind, message };
  if (opts?.documentId !== undefined) issue.documentId = opts.documentId;
  if (opts?.detail !== undefined) issue.detail = opts.detail;
  return issue;
}

/**
 * Turns anything caught from a failed document into an issue with a readable message.
 */
export function issueFromError(kind: IssueKind, err: unknown, documentId?: string): ProcessingIssue {
  if (err instanceof Error) {
    return createIssue(kind, truncateString(err.message), {
      documentId,
      detail: { name: err.name, stack: truncateString(err.stack ?? '', 1000) || undefined },
    });
  }
  return createIssue(kind, truncateString(String(err)), { documentId });
}
