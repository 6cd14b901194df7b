/**
 * Error thrown when a repository has no policy and its owner is not allowed
 */

export class UnconfiguredRepositoryError extends Error {
  public readonly repository: string;

  constructor(repository: string) {
    super(`The repository ${repository} is unconfigured`);
    this.name = 'UnconfiguredRepositoryError';
    this.repository = repository;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnconfiguredRepositoryError);
    }
  }
}
