/**
 * Check Reporter
 *
 * Drives the GitHub check run of a pull request from in progress to completed,
 * running the validation in between with retries. Whatever happens during
 * validation, the check run is completed exactly once; the completing update
 * itself is retried.
 */

import type { CheckReport, CheckRun, HostingPlatform, PullRequestRef } from '../types';
import { UnconfiguredRepositoryError, VerificationError } from '../errors';
import { RetryExhaustedError, retryWithBackoff } from '../utils/retry';
import { logger } from '../utils/logger';
import {
  CHECK_NAME,
  INTERNAL_ERROR_REPORT,
  UNKNOWN_REPOSITORY_REPORT,
  buildCheckReport,
  type ValidationFindings
} from './check-report';

export interface CheckReporterOptions {
  readonly checkName?: string;
  readonly maxAttempts?: number;
  /** Backoff unit; attempt n waits n * retryDelayMs before the next one */
  readonly retryDelayMs?: number;
  readonly now?: () => Date;
}

export interface CheckOutcome {
  readonly checkRun: CheckRun;
  readonly report: CheckReport;
  /** Present only when validation succeeded */
  readonly findings?: ValidationFindings;
}

export class CheckReporter {
  private readonly platform: HostingPlatform;
  private readonly checkName: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;

  constructor(platform: HostingPlatform, options: CheckReporterOptions = {}) {
    this.platform = platform;
    this.checkName = options.checkName ?? CHECK_NAME;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  get name(): string {
    return this.checkName;
  }

  /**
   * Marks the check as in progress, reusing an existing check run when given
   */
  async start(pullRequest: PullRequestRef, existing?: CheckRun): Promise<CheckRun> {
    const start = {
      name: this.checkName,
      headSha: pullRequest.headSha,
      startedAt: this.now().toISOString()
    };

    if (!existing) {
      return await this.platform.createCheckRun(pullRequest.repository, start);
    }

    if (existing.status === 'in_progress') {
      return existing;
    }

    return await this.platform.updateCheckRun(pullRequest.repository, existing.id, start);
  }

  async complete(pullRequest: PullRequestRef, checkRun: CheckRun, report: CheckReport): Promise<CheckRun> {
    return await this.platform.updateCheckRun(pullRequest.repository, checkRun.id, {
      completedAt: this.now().toISOString(),
      conclusion: report.conclusion,
      output: report.output
    });
  }

  /**
   * Runs `validate` under the check run and completes it with the resulting report
   *
   * @param pullRequest - Pull request being checked
   * @param existing - Check run to reuse, e.g. on a re-requested check
   * @param validate - Validation body; retried on failure
   */
  async run(
    pullRequest: PullRequestRef,
    existing: CheckRun | undefined,
    validate: () => Promise<ValidationFindings>
  ): Promise<CheckOutcome> {
    const context = { repository: pullRequest.repository, prNumber: pullRequest.number };
    const checkRun = await this.start(pullRequest, existing);

    let report: CheckReport;
    let findings: ValidationFindings | undefined;

    try {
      findings = await retryWithBackoff(() => validate(), {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        isRetryable: error => !(error instanceof UnconfiguredRepositoryError),
        onRetry: (error, attempt) => {
          logger.error('Failure during validation of pull request', error, { ...context, attempt });
        }
      });
      report = buildCheckReport(findings, checkRun.output.text);
    } catch (error) {
      if (error instanceof UnconfiguredRepositoryError) {
        report = UNKNOWN_REPOSITORY_REPORT;
      } else {
        const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
        const lastError = error instanceof RetryExhaustedError ? error.lastError : error;
        const failure = new VerificationError(
          pullRequest.repository,
          pullRequest.number,
          attempts,
          lastError instanceof Error ? lastError : new Error(String(lastError))
        );
        logger.error('Validation of pull request failed', failure, { ...context, attempt: attempts });
        report = INTERNAL_ERROR_REPORT;
      }
    }

    const completed = await retryWithBackoff(() => this.complete(pullRequest, checkRun, report), {
      maxAttempts: this.maxAttempts,
      delayMs: this.retryDelayMs,
      onRetry: (error, attempt) => {
        logger.error('Failed to complete check run', error, { ...context, checkRunId: checkRun.id, attempt });
      }
    });

    logger.info('Completed check run', {
      ...context,
      checkRunId: completed.id,
      conclusion: report.conclusion,
      title: report.output.title
    });

    return { checkRun: completed, report, findings };
  }
}
