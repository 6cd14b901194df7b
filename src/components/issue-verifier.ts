/**
 * Issue Verifier
 *
 * Classifies referenced issue ids against the Redmine project a repository is
 * bound to: valid, filed in the wrong project, or not found.
 */

import type { Issue, IssueVerificationResult, Project, RepoPolicy, Tracker } from '../types';
import { UnknownProjectError } from '../errors';
import { logger } from '../utils/logger';

const byId = (a: { id: number }, b: { id: number }): number => a.id - b.id;

export class IssueVerifier {
  private readonly tracker: Tracker;

  constructor(tracker: Tracker) {
    this.tracker = tracker;
  }

  /**
   * Verifies issue ids against the policy's tracker project
   *
   * @throws {UnknownProjectError} If the policy has no tracker project or it doesn't exist
   */
  async verify(policy: RepoPolicy, issueIds: Iterable<number>): Promise<IssueVerificationResult> {
    const project = await this.resolveProject(policy.trackerProject);
    const acceptedProjectIds = new Set([project.id, ...(await this.resolveExtraProjectIds(policy))]);

    const ids = [...new Set(issueIds)].sort((a, b) => a - b);
    const issues = ids.length > 0 ? await this.tracker.getIssues(ids) : [];
    const found = new Map(issues.map(issue => [issue.id, issue]));

    const validIssues: Issue[] = [];
    const invalidProjectIssues: Issue[] = [];
    const missingIssueIds: number[] = [];

    for (const id of ids) {
      const issue = found.get(id);
      if (!issue) {
        missingIssueIds.push(id);
      } else if (acceptedProjectIds.has(issue.project.id)) {
        validIssues.push(issue);
      } else {
        invalidProjectIssues.push(issue);
      }
    }

    logger.debug('Verified issues', {
      project: project.identifier,
      valid: validIssues.length,
      invalidProject: invalidProjectIssues.length,
      missing: missingIssueIds.length
    });

    return {
      project,
      validIssues: validIssues.sort(byId),
      invalidProjectIssues: invalidProjectIssues.sort(byId),
      missingIssueIds
    };
  }

  private async resolveProject(identifier: string | undefined): Promise<Project> {
    if (!identifier) {
      throw new UnknownProjectError();
    }

    const project = await this.tracker.getProject(identifier);
    if (!project) {
      throw new UnknownProjectError(identifier);
    }

    return project;
  }

  private async resolveExtraProjectIds(policy: RepoPolicy): Promise<number[]> {
    const ids: number[] = [];

    for (const identifier of policy.extraAcceptedProjects) {
      const project = await this.tracker.getProject(identifier);
      if (project) {
        ids.push(project.id);
      } else {
        logger.warn('Ignoring unknown accepted project', { project: identifier });
      }
    }

    return ids;
  }
}
