/**
 * Pull request and check run types
 */

export interface PullRequestRef {
  /** Base repository as "owner/repo" */
  readonly repository: string;
  readonly number: number;
  readonly title: string;
  readonly url: string;
  readonly author?: string;
  readonly baseBranch: string;
  readonly headBranch: string;
  readonly headSha: string;
  readonly merged: boolean;
}

export type CheckRunStatus = 'queued' | 'in_progress' | 'completed';

export type CheckConclusion = 'success' | 'failure';

export interface CheckRunOutput {
  readonly title?: string | null;
  readonly summary?: string | null;
  readonly text?: string | null;
}

export interface CheckRun {
  readonly id: number;
  readonly name: string;
  readonly status: CheckRunStatus;
  readonly output: CheckRunOutput;
}

/**
 * Output sent when completing a check run. `text` is absent, not empty, when
 * it must not overwrite the previous value.
 */
export interface CheckReportOutput {
  readonly title: string;
  readonly summary: string;
  readonly text?: string;
}

export interface CheckReport {
  readonly conclusion: CheckConclusion;
  readonly output: CheckReportOutput;
}

export interface CheckRunStart {
  readonly name: string;
  readonly headSha: string;
  readonly startedAt: string;
}

export interface CheckRunCompletion {
  readonly completedAt: string;
  readonly conclusion: CheckConclusion;
  readonly output: CheckReportOutput;
}
