import { describe, it, expect } from 'vitest';
import { createIssue, issueFromError } from './issues';

describe('issues', () => {
  it('omits optional fields that were not given', () => {
    expect(createIssue('EmptyCorpus', 'no sections to rank')).toEqual({ kind: 'EmptyCorpus', message: 'no sections to rank' });
    expect(createIssue('EmptyInput', 'no text', { documentId: 'a' })).toEqual({
      kind: 'EmptyInput',
      message: 'no text',
      documentId: 'a',
    });
  });

  it('turns thrown values into issues', () => {
    const fromError = issueFromError('DocumentFailed', new TypeError('bad page'), 'doc-1');
    expect(fromError.kind).toBe('DocumentFailed');
    expect(fromError.message).toBe('bad page');
    expect(fromError.documentId).toBe('doc-1');

    expect(issueFromError('DocumentFailed', 'x'.repeat(400)).message).toHaveLength(301);
  });
});
