/**
 * Library entry point and application wiring
 */

import { Octokit } from '@octokit/rest';
import { Webhooks } from '@octokit/webhooks';
import { ConfigLoader } from './components/config-loader';
import { GitHubPlatform } from './components/github-platform';
import { PolicyStore } from './components/policy-store';
import { PullRequestProcessor } from './components/pull-request-processor';
import { RedmineTracker } from './components/redmine-tracker';
import { createWebhookHandlers, registerWebhookHandlers } from './components/webhook-router';
import type { AppConfig } from './types';
import { logger } from './utils/logger';

export * from './types';
export * from './errors';
export * from './utils';
export * from './components/check-report';
export * from './components/check-reporter';
export * from './components/commit-parser';
export * from './components/config-loader';
export * from './components/github-platform';
export * from './components/issue-verifier';
export * from './components/policy-store';
export * from './components/pull-request-processor';
export * from './components/redmine-tracker';
export * from './components/tracker-reconciler';
export * from './components/webhook-router';

export const APP_NAME = 'pr-issue-gate';
export const APP_VERSION = '0.1.0';

export interface App {
  readonly webhooks: Webhooks;
  readonly processor: PullRequestProcessor;
}

/**
 * Builds the processor and webhook receiver from configuration. Policy and
 * user tables are loaded once here and stay read-only afterwards.
 */
export async function createApp(config: AppConfig, loader: ConfigLoader = new ConfigLoader(config.awsRegion)): Promise<App> {
  const [webhookSecret, githubToken, redmineApiKey] = await Promise.all([
    loader.resolveSecret('WEBHOOK_SECRET', config.webhookSecret),
    loader.resolveSecret('GITHUB_TOKEN', config.githubToken),
    loader.resolveSecret('REDMINE_API_KEY', config.redmineApiKey)
  ]);

  const [policies, users] = await Promise.all([
    loader.loadPolicies(config.reposConfigPath),
    loader.loadUsers(config.usersConfigPath)
  ]);

  const processor = new PullRequestProcessor({
    platform: new GitHubPlatform(new Octokit({ auth: githubToken, userAgent: `${APP_NAME}/${APP_VERSION}` })),
    tracker: new RedmineTracker({ baseUrl: config.redmineUrl, apiKey: redmineApiKey }),
    policies: new PolicyStore(policies, config.allowedOrganizations),
    users,
    reporter: { retryDelayMs: config.retryDelayMs }
  });

  const webhooks = new Webhooks({ secret: webhookSecret });
  registerWebhookHandlers(webhooks, createWebhookHandlers(processor));

  logger.info('Application initialized', {
    repositories: policies.size,
    users: users.size,
    allowedOrganizations: config.allowedOrganizations
  });

  return { webhooks, processor };
}
