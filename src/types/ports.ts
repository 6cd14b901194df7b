/**
 * Boundaries to the two external systems
 */

import type { Commit } from './commit';
import type { Issue, IssueUpdate, Project, Version } from './issue';
import type { CheckRun, CheckRunCompletion, CheckRunStart, PullRequestRef } from './pull-request';

export interface HostingPlatform {
  getPullRequest(repository: string, pullNumber: number): Promise<PullRequestRef>;
  listCommits(pullRequest: PullRequestRef): Promise<Commit[]>;
  createCheckRun(repository: string, start: CheckRunStart): Promise<CheckRun>;
  updateCheckRun(
    repository: string,
    checkRunId: number,
    update: CheckRunStart | CheckRunCompletion
  ): Promise<CheckRun>;
  findCheckRun(repository: string, checkSuiteId: number, name: string): Promise<CheckRun | undefined>;
}

export interface Tracker {
  /** Resolves to undefined when no project has the identifier */
  getProject(identifier: string): Promise<Project | undefined>;
  getIssues(ids: readonly number[]): Promise<Issue[]>;
  getVersions(projectId: number): Promise<Version[]>;
  updateIssue(id: number, update: IssueUpdate): Promise<void>;
}
