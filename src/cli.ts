#!/usr/bin/env node
/**
 * Process entry point: loads configuration from the environment and starts the
 * GitHub webhook listener.
 *
 * Exit codes:
 * - 0: Stopped by a signal
 * - 1: Invalid configuration or fatal error
 */

import http from 'http';
import { createNodeMiddleware } from '@octokit/webhooks';
import { APP_NAME, APP_VERSION, createApp } from './index';
import { loadConfigFromEnvironment } from './components/config-loader';
import { ConfigurationError } from './errors';
import { logger } from './utils/logger';
import { sanitizeErrorMessage } from './utils/sanitize';
import type { AppConfig } from './types';

function printUsage(): void {
  console.error('\nRequired environment variables:');
  console.error('  - REDMINE_URL: Base URL of the Redmine instance');
  console.error('  - WEBHOOK_SECRET or WEBHOOK_SECRET_ARN: GitHub webhook secret');
  console.error('  - GITHUB_TOKEN or GITHUB_TOKEN_ARN: GitHub API token');
  console.error('  - REDMINE_API_KEY or REDMINE_API_KEY_ARN: Redmine API key');
  console.error('\nOptional environment variables:');
  console.error('  - PORT: Listening port (default: 3000)');
  console.error('  - WEBHOOK_PATH: Webhook endpoint path (default: /api/github/webhooks)');
  console.error('  - REPOS_CONFIG: Repository policy file (default: config/repos.yaml)');
  console.error('  - USERS_CONFIG: GitHub to Redmine user file (default: config/users.yaml)');
  console.error('  - ALLOWED_ORGANIZATIONS: Comma-separated owners whose unconfigured repositories are accepted');
  console.error('  - RETRY_DELAY_MS: Backoff unit between validation attempts (default: 1000)');
  console.error('  - AWS_REGION: AWS region for *_ARN secrets (default: us-east-1)');
  console.error('  - LOG_LEVEL: DEBUG, INFO, WARN or ERROR (default: DEBUG)');
}

export async function main(): Promise<void> {
  let config: AppConfig;

  try {
    config = loadConfigFromEnvironment();
  } catch (error) {
    const problems = error instanceof ConfigurationError ? error.validationErrors : [sanitizeErrorMessage(error)];
    logger.error('Failed to load configuration', error, { problems });
    console.error(`ERROR: ${problems.join('; ')}`);
    printUsage();
    process.exit(1);
  }

  const { webhooks } = await createApp(config);
  const server = http.createServer(createNodeMiddleware(webhooks, { path: config.webhookPath }));

  server.listen(config.port, () => {
    logger.info('Webhook listener started', {
      app: APP_NAME,
      version: APP_VERSION,
      port: config.port,
      path: config.webhookPath
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', reason);
    process.exit(1);
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });

  main().catch((error: unknown) => {
    logger.error('Fatal error', error);
    console.error(`Fatal error: ${sanitizeErrorMessage(error)}`);
    process.exit(1);
  });
}
