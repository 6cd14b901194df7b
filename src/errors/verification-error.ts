/**
 * Error thrown when validating a pull request keeps failing after all attempts
 */

export class VerificationError extends Error {
  public readonly repository: string;
  public readonly prNumber: number;
  public readonly attempts: number;
  public readonly cause?: Error;

  constructor(repository: string, prNumber: number, attempts: number, cause?: Error) {
    super(
      `Validation of ${repository}#${prNumber} failed after ${attempts} attempts` +
        (cause ? `: ${cause.message}` : '')
    );
    this.name = 'VerificationError';
    this.repository = repository;
    this.prNumber = prNumber;
    this.attempts = attempts;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VerificationError);
    }
  }
}
