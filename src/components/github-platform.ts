/**
 * GitHub Platform
 *
 * HostingPlatform implementation on the GitHub REST API.
 */

import { Octokit } from '@octokit/rest';
import type {
  CheckRun,
  CheckRunCompletion,
  CheckRunStart,
  CheckRunStatus,
  Commit,
  HostingPlatform,
  PullRequestRef
} from '../types';
import { parseCommit } from './commit-parser';

/**
 * Fields of a pull request shared by webhook payloads and the REST API
 */
export interface GitHubPullRequest {
  readonly number: number;
  readonly title: string;
  readonly html_url: string;
  readonly user: { readonly login: string } | null;
  readonly head: { readonly ref: string; readonly sha: string };
  readonly base: { readonly ref: string; readonly repo: { readonly full_name: string } };
  readonly merged?: boolean | null;
}

/**
 * Fields of a check run shared by webhook payloads and the REST API
 */
export interface GitHubCheckRun {
  readonly id: number;
  readonly name: string;
  readonly status: string;
  readonly output?: {
    readonly title?: string | null;
    readonly summary?: string | null;
    readonly text?: string | null;
  };
}

export function toPullRequestRef(pullRequest: GitHubPullRequest): PullRequestRef {
  return {
    repository: pullRequest.base.repo.full_name,
    number: pullRequest.number,
    title: pullRequest.title,
    url: pullRequest.html_url,
    author: pullRequest.user?.login,
    baseBranch: pullRequest.base.ref,
    headBranch: pullRequest.head.ref,
    headSha: pullRequest.head.sha,
    merged: pullRequest.merged === true
  };
}

function toCheckRunStatus(status: string): CheckRunStatus {
  return status === 'in_progress' || status === 'completed' ? status : 'queued';
}

export function toCheckRun(checkRun: GitHubCheckRun): CheckRun {
  return {
    id: checkRun.id,
    name: checkRun.name,
    status: toCheckRunStatus(checkRun.status),
    output: {
      title: checkRun.output?.title ?? null,
      summary: checkRun.output?.summary ?? null,
      text: checkRun.output?.text ?? null
    }
  };
}

export function splitRepository(repository: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repository.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository name: ${repository}`);
  }
  return { owner, repo };
}

export class GitHubPlatform implements HostingPlatform {
  private readonly octokit: Octokit;

  constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  async getPullRequest(repository: string, pullNumber: number): Promise<PullRequestRef> {
    const { data } = await this.octokit.rest.pulls.get({
      ...splitRepository(repository),
      pull_number: pullNumber
    });
    return toPullRequestRef(data);
  }

  async listCommits(pullRequest: PullRequestRef): Promise<Commit[]> {
    const items = await this.octokit.paginate(this.octokit.rest.pulls.listCommits, {
      ...splitRepository(pullRequest.repository),
      pull_number: pullRequest.number,
      per_page: 100
    });
    return items.map(item => parseCommit(item.sha, item.commit.message));
  }

  async createCheckRun(repository: string, start: CheckRunStart): Promise<CheckRun> {
    const { data } = await this.octokit.rest.checks.create({
      ...splitRepository(repository),
      name: start.name,
      head_sha: start.headSha,
      status: 'in_progress',
      started_at: start.startedAt
    });
    return toCheckRun(data);
  }

  async updateCheckRun(
    repository: string,
    checkRunId: number,
    update: CheckRunStart | CheckRunCompletion
  ): Promise<CheckRun> {
    const target = { ...splitRepository(repository), check_run_id: checkRunId };

    if ('conclusion' in update) {
      const { data } = await this.octokit.rest.checks.update({
        ...target,
        status: 'completed',
        completed_at: update.completedAt,
        conclusion: update.conclusion,
        output: update.output
      });
      return toCheckRun(data);
    }

    const { data } = await this.octokit.rest.checks.update({
      ...target,
      name: update.name,
      status: 'in_progress',
      started_at: update.startedAt
    });
    return toCheckRun(data);
  }

  async findCheckRun(repository: string, checkSuiteId: number, name: string): Promise<CheckRun | undefined> {
    const { data } = await this.octokit.rest.checks.listForSuite({
      ...splitRepository(repository),
      check_suite_id: checkSuiteId,
      check_name: name
    });
    const match = data.check_runs.find(checkRun => checkRun.name === name);
    return match ? toCheckRun(match) : undefined;
  }
}
