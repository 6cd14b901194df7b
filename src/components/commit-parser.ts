/**
 * Commit Parser
 *
 * Extracts Redmine issue references from the first line of a commit message.
 * Accepted form: `Fixes #123, #456: description` or `Refs #123 - description`.
 */

import type { Commit } from '../types';

const COMMIT_SUBJECT_REGEX = /^(?<action>fixes|refs) (?<issues>#\d+(?:, ?#\d+)*)(?::| -) .*$/i;
const ISSUE_ID_REGEX = /#(\d+)/g;
const LINE_BREAK_REGEX = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

export function commitSubject(message: string): string {
  return message.split(LINE_BREAK_REGEX, 1)[0] ?? '';
}

/**
 * Parses a commit. A subject that doesn't follow the required syntax yields
 * empty `fixes` and `refs`; it is never an error.
 */
export function parseCommit(sha: string, message: string): Commit {
  const subject = commitSubject(message);
  const fixes = new Set<number>();
  const refs = new Set<number>();

  const match = COMMIT_SUBJECT_REGEX.exec(subject);
  const action = match?.groups?.action;
  const issues = match?.groups?.issues;
  if (action && issues) {
    const target = action.toLowerCase() === 'fixes' ? fixes : refs;
    for (const [, id] of issues.matchAll(ISSUE_ID_REGEX)) {
      target.add(Number.parseInt(id, 10));
    }
  }

  return { sha, message, subject, fixes, refs };
}

export function referencedIssueIds(commit: Commit): number[] {
  return [...commit.fixes, ...commit.refs];
}
