/**
 * Check report formatting
 *
 * Turns the findings of a validation run into the conclusion and output of a
 * GitHub check run.
 */

import type { CheckReport, CheckReportOutput, Commit, Issue, Project } from '../types';

export const CHECK_NAME = 'Redmine issues';

export const MULTI_SECTION_TITLE = 'Redmine Issue Report';

export interface ValidationFindings {
  readonly invalidCommits: readonly Commit[];
  readonly invalidProjectIssues: readonly Issue[];
  readonly missingIssueIds: readonly number[];
  readonly validIssues: readonly Issue[];
  /** Project issues were verified against; absent when the repository has none */
  readonly project?: Project;
}

interface Section {
  readonly header: string;
  readonly lines: readonly string[];
}

export const UNKNOWN_REPOSITORY_REPORT: CheckReport = {
  conclusion: 'failure',
  output: {
    title: 'Unknown repository',
    summary: 'This repository is not configured for Redmine issue checks. Contact the maintainers of this bot to add it.'
  }
};

export const INTERNAL_ERROR_REPORT: CheckReport = {
  conclusion: 'failure',
  output: {
    title: 'Internal error while testing',
    summary: 'Please retry later'
  }
};

export function formatInvalidCommits(commits: readonly Commit[]): string[] {
  return commits.map(commit => `${commit.sha} must be in the format \`fixes #redmine - brief description\``);
}

export function formatIssues(issues: readonly Issue[]): string[] {
  return [...issues]
    .sort((a, b) => a.id - b.id)
    .map(issue => `[#${issue.id}: ${issue.subject}](${issue.url})`);
}

/**
 * Remediation instructions for issues filed in the wrong project
 */
export function formatDetails(invalidIssues: readonly Issue[], correctProject: Project | undefined): string {
  if (!correctProject) {
    return '';
  }

  return invalidIssues.map(issue => `### [#${issue.id}: ${issue.subject}](${issue.url})

* check [#${issue.id}](${issue.url}) is the intended issue
* move [ticket #${issue.id}](${issue.url}) from ${issue.project.name} to the ${correctProject.name} project
* or file a new ticket in the [${correctProject.name} project](${correctProject.url}/issues/new)
`).join('\n');
}

function summarize(sections: readonly Section[], showHeaders: boolean): string {
  const lines: string[] = [];

  for (const section of sections) {
    if (showHeaders) {
      lines.push(`### ${section.header}`);
    }
    lines.push(...section.lines.map(line => `* ${line}`));
  }

  return lines.join('\n');
}

/**
 * Builds the check report from finalized findings
 *
 * @param findings - Results of the validation run
 * @param previousText - `output.text` currently on the check run
 */
export function buildCheckReport(findings: ValidationFindings, previousText?: string | null): CheckReport {
  const sections: Section[] = [
    { header: 'Invalid commits', lines: formatInvalidCommits(findings.invalidCommits) },
    { header: 'Invalid project', lines: formatIssues(findings.invalidProjectIssues) },
    { header: 'Issues not found in redmine', lines: findings.missingIssueIds.map(id => `#${id}`) },
    { header: 'Valid issues', lines: formatIssues(findings.validIssues) }
  ];

  const nonEmpty = sections.filter(section => section.lines.length > 0);
  const singleSection = nonEmpty.length === 1 ? nonEmpty[0] : undefined;
  const onlyValid = nonEmpty.every(section => section.header === 'Valid issues');

  const text = formatDetails(findings.invalidProjectIssues, findings.project);
  // GitHub rejects a null text, so an empty one is only sent to clear a previous text
  const keepText = text !== '' || Boolean(previousText);

  const output: CheckReportOutput = {
    title: singleSection ? singleSection.header : MULTI_SECTION_TITLE,
    summary: nonEmpty.length > 0 ? summarize(nonEmpty, !singleSection) : 'No issues referenced',
    ...(keepText ? { text } : {})
  };

  return {
    conclusion: onlyValid ? 'success' : 'failure',
    output
  };
}
