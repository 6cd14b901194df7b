/**
 * Webhook Router
 *
 * Maps GitHub webhook events onto the pull request processor.
 */

import type { Webhooks } from '@octokit/webhooks';
import { logger } from '../utils/logger';
import { toCheckRun, toPullRequestRef, type GitHubCheckRun, type GitHubPullRequest } from './github-platform';
import type { PullRequestProcessor } from './pull-request-processor';

interface RepositoryPayload {
  readonly full_name: string;
}

interface PullRequestNumber {
  readonly number: number;
}

export interface PullRequestEventPayload {
  readonly action: string;
  readonly pull_request: GitHubPullRequest;
}

export interface CheckRunEventPayload {
  readonly repository: RepositoryPayload;
  readonly check_run: GitHubCheckRun & { readonly pull_requests: readonly PullRequestNumber[] };
}

export interface CheckSuiteEventPayload {
  readonly repository: RepositoryPayload;
  readonly check_suite: { readonly id: number; readonly pull_requests: readonly PullRequestNumber[] };
}

export interface WebhookHandlers {
  onPullRequestChanged(payload: PullRequestEventPayload): Promise<void>;
  onPullRequestClosed(payload: PullRequestEventPayload): Promise<void>;
  onCheckRunRerequested(payload: CheckRunEventPayload): Promise<void>;
  onCheckSuiteRequested(payload: CheckSuiteEventPayload): Promise<void>;
}

async function handleEvent(
  event: string,
  context: Record<string, unknown>,
  work: () => Promise<void>
): Promise<void> {
  logger.debug('Handling webhook event', { event, ...context });

  try {
    await work();
  } catch (error) {
    logger.error('Failed to handle webhook event', error, { event, ...context });
    throw error;
  }
}

export function createWebhookHandlers(processor: PullRequestProcessor): WebhookHandlers {
  return {
    async onPullRequestChanged(payload) {
      const pullRequest = toPullRequestRef(payload.pull_request);
      await handleEvent(
        `pull_request.${payload.action}`,
        { repository: pullRequest.repository, prNumber: pullRequest.number },
        async () => {
          await processor.validatePullRequest(pullRequest);
        }
      );
    },

    async onPullRequestClosed(payload) {
      const pullRequest = toPullRequestRef(payload.pull_request);
      await handleEvent(
        'pull_request.closed',
        { repository: pullRequest.repository, prNumber: pullRequest.number },
        async () => {
          const result = await processor.onPullRequestClosed(pullRequest);
          logger.info('Processed closed pull request', {
            repository: pullRequest.repository,
            prNumber: pullRequest.number,
            ...result
          });
        }
      );
    },

    async onCheckRunRerequested(payload) {
      const repository = payload.repository.full_name;
      await handleEvent(
        'check_run.rerequested',
        { repository, checkRunId: payload.check_run.id },
        async () => {
          await processor.onCheckRunRerequested(
            repository,
            toCheckRun(payload.check_run),
            payload.check_run.pull_requests.map(pullRequest => pullRequest.number)
          );
        }
      );
    },

    async onCheckSuiteRequested(payload) {
      const repository = payload.repository.full_name;
      await handleEvent(
        'check_suite',
        { repository, checkSuiteId: payload.check_suite.id },
        async () => {
          await processor.onCheckSuiteRequested(
            repository,
            payload.check_suite.id,
            payload.check_suite.pull_requests.map(pullRequest => pullRequest.number)
          );
        }
      );
    }
  };
}

export function registerWebhookHandlers(webhooks: Webhooks, handlers: WebhookHandlers): void {
  webhooks.on(
    ['pull_request.opened', 'pull_request.ready_for_review', 'pull_request.reopened', 'pull_request.synchronize'],
    async ({ payload }) => {
      await handlers.onPullRequestChanged(payload);
    }
  );

  webhooks.on('pull_request.closed', async ({ payload }) => {
    await handlers.onPullRequestClosed(payload);
  });

  webhooks.on('check_run.rerequested', async ({ payload }) => {
    await handlers.onCheckRunRerequested(payload);
  });

  webhooks.on(['check_suite.requested', 'check_suite.rerequested'], async ({ payload }) => {
    await handlers.onCheckSuiteRequested(payload);
  });
}
