/**
 * Runtime configuration types
 */

export interface AppConfig {
  readonly port: number;
  readonly webhookPath: string;
  readonly webhookSecret: SecretSource;
  readonly githubToken: SecretSource;
  readonly redmineUrl: string;
  readonly redmineApiKey: SecretSource;
  readonly reposConfigPath: string;
  readonly usersConfigPath: string;
  readonly allowedOrganizations: readonly string[];
  readonly retryDelayMs: number;
  readonly awsRegion: string;
}

/**
 * A secret given either directly or as an AWS Secrets Manager ARN
 */
export type SecretSource =
  | { readonly kind: 'value'; readonly value: string }
  | { readonly kind: 'secretArn'; readonly arn: string };
