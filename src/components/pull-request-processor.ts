/**
 * Pull Request Processor
 *
 * Binds parsing, policy, verification, reporting and reconciliation into the
 * flows triggered by GitHub events:
 * - pull request opened or updated: validate, report the check, sync issues
 * - check run or suite re-requested: the same, reusing the existing check run
 * - pull request merged: set the fix-version of fixed issues
 */

import type {
  CheckRun,
  Commit,
  HostingPlatform,
  PullRequestRef,
  RepoPolicy,
  Tracker,
  UserDirectory,
  Version
} from '../types';
import { UnconfiguredRepositoryError } from '../errors';
import { logger } from '../utils/logger';
import { latestOpenVersion } from '../utils/version';
import { CheckReporter, type CheckOutcome, type CheckReporterOptions } from './check-reporter';
import type { ValidationFindings } from './check-report';
import { referencedIssueIds } from './commit-parser';
import { IssueVerifier } from './issue-verifier';
import type { PolicyStore } from './policy-store';
import { TrackerReconciler } from './tracker-reconciler';

export const DEVELOPMENT_BRANCHES: readonly string[] = ['main', 'master', 'develop', 'deb/develop', 'rpm/develop'];

const STABLE_SUFFIX = '-stable';

export type FixVersionSkipReason =
  | 'not-merged'
  | 'unrecognized-branch'
  | 'unconfigured-repository'
  | 'no-project'
  | 'no-fixes'
  | 'no-open-version';

export type FixVersionResult =
  | { readonly status: 'skipped'; readonly reason: FixVersionSkipReason }
  | { readonly status: 'applied'; readonly version: Version; readonly issueIds: number[] };

export interface PullRequestProcessorDeps {
  readonly platform: HostingPlatform;
  readonly tracker: Tracker;
  readonly policies: PolicyStore;
  readonly users: UserDirectory;
  readonly reporter?: CheckReporterOptions;
}

/**
 * Version prefix implied by a merge target; undefined for branches that get no fix-version.
 * "3.0-stable" gives "3.0.", development branches give "".
 */
export function versionPrefixForBranch(branch: string): string | undefined {
  if (branch.endsWith(STABLE_SUFFIX)) {
    return `${branch.slice(0, -STABLE_SUFFIX.length)}.`;
  }
  return DEVELOPMENT_BRANCHES.includes(branch) ? '' : undefined;
}

export class PullRequestProcessor {
  private readonly platform: HostingPlatform;
  private readonly tracker: Tracker;
  private readonly policies: PolicyStore;
  private readonly verifier: IssueVerifier;
  private readonly reporter: CheckReporter;
  private readonly reconciler: TrackerReconciler;

  constructor(deps: PullRequestProcessorDeps) {
    this.platform = deps.platform;
    this.tracker = deps.tracker;
    this.policies = deps.policies;
    this.verifier = new IssueVerifier(deps.tracker);
    this.reporter = new CheckReporter(deps.platform, deps.reporter);
    this.reconciler = new TrackerReconciler(deps.tracker, deps.users);
  }

  /**
   * Validates a pull request, reports the check run and syncs its valid issues
   *
   * @param pullRequest - Pull request to validate
   * @param existing - Check run to reuse instead of creating a new one
   */
  async validatePullRequest(pullRequest: PullRequestRef, existing?: CheckRun): Promise<CheckOutcome> {
    logger.info('Validating pull request', {
      repository: pullRequest.repository,
      prNumber: pullRequest.number,
      checkRunId: existing?.id
    });

    const outcome = await this.reporter.run(pullRequest, existing, () => this.collectFindings(pullRequest));

    if (outcome.findings && outcome.findings.validIssues.length > 0) {
      const summary = await this.reconciler.reconcile(pullRequest, outcome.findings.validIssues);
      logger.info('Reconciled Redmine issues', {
        repository: pullRequest.repository,
        prNumber: pullRequest.number,
        ...summary
      });
    }

    return outcome;
  }

  async onCheckRunRerequested(repository: string, checkRun: CheckRun, pullNumbers: readonly number[]): Promise<void> {
    if (pullNumbers.length === 0) {
      logger.warn('Received check_run without pull requests', { repository, checkRunId: checkRun.id });
    }

    for (const pullNumber of pullNumbers) {
      const pullRequest = await this.platform.getPullRequest(repository, pullNumber);
      await this.validatePullRequest(pullRequest, checkRun);
    }
  }

  async onCheckSuiteRequested(repository: string, checkSuiteId: number, pullNumbers: readonly number[]): Promise<void> {
    const checkRun = await this.platform.findCheckRun(repository, checkSuiteId, this.reporter.name);

    if (pullNumbers.length === 0) {
      logger.warn('Received check_suite without pull requests', { repository, checkSuiteId });
    }

    for (const pullNumber of pullNumbers) {
      const pullRequest = await this.platform.getPullRequest(repository, pullNumber);
      await this.validatePullRequest(pullRequest, checkRun);
    }
  }

  /**
   * Sets the fix-version of every issue fixed by a merged pull request to the
   * latest open version of the repository's project
   */
  async onPullRequestClosed(pullRequest: PullRequestRef): Promise<FixVersionResult> {
    const context = { repository: pullRequest.repository, prNumber: pullRequest.number };

    if (!pullRequest.merged) {
      logger.debug('Pull request was closed, not merged', context);
      return { status: 'skipped', reason: 'not-merged' };
    }

    const branchPrefix = versionPrefixForBranch(pullRequest.baseBranch);
    if (branchPrefix === undefined) {
      logger.info('Unable to set fixed in version for branch', { ...context, branch: pullRequest.baseBranch });
      return { status: 'skipped', reason: 'unrecognized-branch' };
    }

    let policy: RepoPolicy;
    try {
      policy = this.policies.lookup(pullRequest.repository);
    } catch (error) {
      if (error instanceof UnconfiguredRepositoryError) {
        return { status: 'skipped', reason: 'unconfigured-repository' };
      }
      throw error;
    }

    if (!policy.trackerProject) {
      logger.info('No Redmine project configured for repository', context);
      return { status: 'skipped', reason: 'no-project' };
    }

    const prefix = `${policy.versionPrefix ?? ''}${branchPrefix}`;
    const commits = await this.platform.listCommits(pullRequest);
    const fixedIds = new Set(commits.flatMap(commit => [...commit.fixes]));
    if (fixedIds.size === 0) {
      return { status: 'skipped', reason: 'no-fixes' };
    }

    const project = await this.tracker.getProject(policy.trackerProject);
    if (!project) {
      logger.warn('Redmine project not found', { ...context, project: policy.trackerProject });
      return { status: 'skipped', reason: 'no-project' };
    }

    const version = latestOpenVersion(await this.tracker.getVersions(project.id), prefix);
    if (!version) {
      logger.info('Unable to determine latest version', { ...context, project: project.name, prefix });
      return { status: 'skipped', reason: 'no-open-version' };
    }

    const issues = await this.tracker.getIssues([...fixedIds].sort((a, b) => a - b));
    const issueIds: number[] = [];

    for (const issue of [...issues].sort((a, b) => a.id - b.id)) {
      if (issue.project.id !== project.id || issue.fixedVersionId === version.id) {
        continue;
      }
      logger.info('Setting fixed in version', { ...context, issueId: issue.id, version: version.name });
      await this.tracker.updateIssue(issue.id, { fixedVersionId: version.id });
      issueIds.push(issue.id);
    }

    return { status: 'applied', version, issueIds };
  }

  private async collectFindings(pullRequest: PullRequestRef): Promise<ValidationFindings> {
    const policy = this.policies.lookup(pullRequest.repository);
    const commits = await this.platform.listCommits(pullRequest);

    const issueIds = new Set<number>();
    const invalidCommits: Commit[] = [];

    for (const commit of commits) {
      const referenced = referencedIssueIds(commit);
      referenced.forEach(id => issueIds.add(id));
      if (policy.required && referenced.length === 0) {
        invalidCommits.push(commit);
      }
    }

    if (!policy.trackerProject) {
      return { invalidCommits, invalidProjectIssues: [], missingIssueIds: [], validIssues: [] };
    }

    const verification = await this.verifier.verify(policy, issueIds);

    return {
      invalidCommits,
      invalidProjectIssues: verification.invalidProjectIssues,
      missingIssueIds: verification.missingIssueIds,
      validIssues: verification.validIssues,
      project: verification.project
    };
  }
}
