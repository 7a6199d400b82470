import type { IssueKind, ReportedIssue } from './types.js';

const ISSUE_TOKENS: ReadonlyArray<[IssueKind, string]> = [
  ['visibility', 'visibility'],
  ['unclear', 'unclear'],
  ['waiting', 'waiting'],
];

/**
 * Map a client-reported issue string to the kinds the engine reacts to.
 * Matching is a case-insensitive substring test; a string may carry several
 * kinds or none.
 */
export function classifyIssue(text: string): ReportedIssue {
  const lowered = text.toLowerCase();
  const kinds = ISSUE_TOKENS
    .filter(([, token]) => lowered.includes(token))
    .map(([kind]) => kind);
  return { text, kinds };
}

export function classifyIssues(texts: readonly string[]): ReportedIssue[] {
  return texts.map(classifyIssue);
}

export function hasIssueKind(issues: readonly ReportedIssue[], ...kinds: IssueKind[]): boolean {
  return issues.some(issue => issue.kinds.some(kind => kinds.includes(kind)));
}

export function everyIssueHasKind(issues: readonly ReportedIssue[], ...kinds: IssueKind[]): boolean {
  return issues.every(issue => issue.kinds.some(kind => kinds.includes(kind)));
}
