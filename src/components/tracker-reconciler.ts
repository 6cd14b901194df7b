/**
 * Tracker Reconciler
 *
 * Brings the Redmine issues referenced by a pull request in line with it:
 * linked pull requests, assignee and status. Only fields that differ are
 * written, so an issue that is already in sync is not touched. Failures are
 * logged and never propagate.
 */

import type { CustomFieldValue, Issue, IssueUpdate, PullRequestRef, Tracker, UserDirectory } from '../types';
import { CustomFieldId, IssueStatus, isClosedStatus, isRejectedStatus } from '../types';
import { ReconciliationError } from '../errors';
import { logger } from '../utils/logger';

const CHERRY_PICK_PREFIXES = ['CP', '[CP]', 'Cherry picks for '];

export interface ReconciliationSummary {
  readonly updated: number[];
  readonly inSync: number[];
  readonly skipped: number[];
  readonly failed: number[];
}

export function isCherryPick(pullRequest: PullRequestRef): boolean {
  return CHERRY_PICK_PREFIXES.some(prefix => pullRequest.title.startsWith(prefix));
}

function fieldValues(value: CustomFieldValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  return value ? [value] : [];
}

export class TrackerReconciler {
  private readonly tracker: Tracker;
  private readonly users: UserDirectory;

  constructor(tracker: Tracker, users: UserDirectory) {
    this.tracker = tracker;
    this.users = users;
  }

  /**
   * Computes the update that syncs `issue` with `pullRequest`; empty when in sync
   */
  diff(pullRequest: PullRequestRef, issue: Issue): IssueUpdate {
    const update: {
      statusId?: number;
      assignedToId?: number;
      customFields?: Array<{ id: number; value: CustomFieldValue }>;
    } = {};

    if (!isCherryPick(pullRequest)) {
      const field = issue.customFields.find(candidate => candidate.id === CustomFieldId.PULL_REQUEST);
      const linked = fieldValues(field?.value);
      if (!linked.includes(pullRequest.url)) {
        update.customFields = [{ id: CustomFieldId.PULL_REQUEST, value: [...linked, pullRequest.url] }];
      }
    }

    const assignee = pullRequest.author ? this.users.get(pullRequest.author) : undefined;
    if (assignee !== undefined && issue.assigneeId === undefined) {
      update.assignedToId = assignee;
    }

    if (!(isClosedStatus(issue.statusId) || issue.statusId === IssueStatus.READY_FOR_TESTING)) {
      update.statusId = IssueStatus.READY_FOR_TESTING;
    }

    return update;
  }

  async reconcile(pullRequest: PullRequestRef, issues: Iterable<Issue>): Promise<ReconciliationSummary> {
    const summary: ReconciliationSummary = { updated: [], inSync: [], skipped: [], failed: [] };

    for (const issue of issues) {
      if (isRejectedStatus(issue.statusId)) {
        summary.skipped.push(issue.id);
        continue;
      }

      const update = this.diff(pullRequest, issue);
      if (Object.keys(update).length === 0) {
        logger.debug('Redmine issue already in sync', { issueId: issue.id });
        summary.inSync.push(issue.id);
        continue;
      }

      try {
        logger.info('Updating Redmine issue', { issueId: issue.id, update });
        await this.tracker.updateIssue(issue.id, update);
        summary.updated.push(issue.id);
      } catch (error) {
        const failure = new ReconciliationError(issue.id, error instanceof Error ? error : undefined);
        logger.error('Failed to update Redmine issue', failure, {
          repository: pullRequest.repository,
          prNumber: pullRequest.number,
          issueId: issue.id
        });
        summary.failed.push(issue.id);
      }
    }

    return summary;
  }
}
