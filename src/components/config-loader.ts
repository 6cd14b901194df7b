/**
 * Configuration Loader - Loads runtime settings, policy tables and secrets
 */

import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from '../errors';
import type { AppConfig, RepoPolicy, SecretSource, UserDirectory } from '../types';
import { logger } from '../utils/logger';

const RepoPolicyEntrySchema = z
  .object({
    tracker_project: z.string().min(1).optional(),
    required: z.boolean().default(false),
    extra_projects: z.array(z.string().min(1)).default([]),
    version_prefix: z.string().min(1).optional()
  })
  .strict()
  .refine(entry => !entry.required || entry.tracker_project !== undefined, {
    message: 'a policy with required: true must name a tracker_project'
  });

const ReposFileSchema = z.record(
  z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'repository keys must look like "owner/repo"'),
  RepoPolicyEntrySchema
);

const UsersFileSchema = z.record(z.string().min(1), z.number().int().positive());

type Environment = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function secretSource(env: Environment, name: string, errors: string[]): SecretSource {
  const value = env[name];
  const arn = env[`${name}_ARN`];

  if (value) {
    return { kind: 'value', value };
  }
  if (arn) {
    return { kind: 'secretArn', arn };
  }

  errors.push(`${name} or ${name}_ARN is required`);
  return { kind: 'value', value: '' };
}

function integer(env: Environment, name: string, fallback: number, min: number, errors: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    errors.push(`${name} must be an integer of at least ${min}`);
    return fallback;
  }
  return value;
}

/**
 * Load configuration from environment variables
 *
 * @throws {ConfigurationError} Listing every missing or invalid variable
 */
export function loadConfigFromEnvironment(env: Environment = process.env): AppConfig {
  const errors: string[] = [];

  const redmineUrl = env.REDMINE_URL ?? '';
  if (!redmineUrl) {
    errors.push('REDMINE_URL is required');
  }

  const config: AppConfig = {
    port: integer(env, 'PORT', 3000, 1, errors),
    webhookPath: env.WEBHOOK_PATH || '/api/github/webhooks',
    webhookSecret: secretSource(env, 'WEBHOOK_SECRET', errors),
    githubToken: secretSource(env, 'GITHUB_TOKEN', errors),
    redmineUrl,
    redmineApiKey: secretSource(env, 'REDMINE_API_KEY', errors),
    reposConfigPath: env.REPOS_CONFIG || 'config/repos.yaml',
    usersConfigPath: env.USERS_CONFIG || 'config/users.yaml',
    allowedOrganizations: (env.ALLOWED_ORGANIZATIONS ?? '')
      .split(',')
      .map(organization => organization.trim())
      .filter(organization => organization.length > 0),
    retryDelayMs: integer(env, 'RETRY_DELAY_MS', 1000, 0, errors),
    awsRegion: env.AWS_REGION || env.AWS_DEFAULT_REGION || 'us-east-1'
  };

  if (errors.length > 0) {
    throw new ConfigurationError('Invalid environment configuration', errors);
  }

  return config;
}

export class ConfigLoader {
  private readonly secretsClient: SecretsManagerClient;

  constructor(region: string = 'us-east-1') {
    this.secretsClient = new SecretsManagerClient({ region });
  }

  /**
   * Load the repository policy table, keyed by "owner/repo"
   */
  async loadPolicies(filePath: string): Promise<Map<string, RepoPolicy>> {
    const result = ReposFileSchema.safeParse(await this.readYaml(filePath));
    if (!result.success) {
      throw new ConfigurationError(`Invalid repository configuration in ${filePath}`, formatIssues(result.error));
    }

    const policies = new Map<string, RepoPolicy>();
    for (const [repository, entry] of Object.entries(result.data)) {
      policies.set(repository, {
        trackerProject: entry.tracker_project,
        required: entry.required,
        extraAcceptedProjects: new Set(entry.extra_projects),
        versionPrefix: entry.version_prefix
      });
    }

    logger.info('Repository policies loaded', { filePath, repositories: policies.size });
    return policies;
  }

  /**
   * Load the GitHub login to Redmine user id table
   */
  async loadUsers(filePath: string): Promise<UserDirectory> {
    const result = UsersFileSchema.safeParse(await this.readYaml(filePath));
    if (!result.success) {
      throw new ConfigurationError(`Invalid user configuration in ${filePath}`, formatIssues(result.error));
    }

    const users = new Map(Object.entries(result.data));
    logger.info('User mappings loaded', { filePath, users: users.size });
    return users;
  }

  /**
   * Resolve a secret, fetching it from Secrets Manager when given as an ARN
   */
  async resolveSecret(name: string, source: SecretSource): Promise<string> {
    if (source.kind === 'value') {
      return source.value;
    }

    logger.info('Retrieving secret from Secrets Manager', { name, secretArn: source.arn });

    try {
      const response = await this.secretsClient.send(new GetSecretValueCommand({ SecretId: source.arn }));
      if (!response.SecretString) {
        throw new Error('Secret value is empty');
      }
      return response.SecretString;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        `Failed to retrieve secret ${name}`,
        [message],
        error instanceof Error ? error : undefined
      );
    }
  }

  private async readYaml(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to read ${filePath}`, [message], error instanceof Error ? error : undefined);
    }

    try {
      return yaml.load(content) ?? {};
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse ${filePath}`, [message], error instanceof Error ? error : undefined);
    }
  }
}
