/**
 * Error raised when synchronizing a Redmine issue with a pull request fails
 */

export class ReconciliationError extends Error {
  public readonly issueId: number;
  public readonly cause?: Error;

  constructor(issueId: number, cause?: Error) {
    super(`Failed to update Redmine issue ${issueId}` + (cause ? `: ${cause.message}` : ''));
    this.name = 'ReconciliationError';
    this.issueId = issueId;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReconciliationError);
    }
  }
}
