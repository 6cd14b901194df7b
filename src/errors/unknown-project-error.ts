/**
 * Error thrown when the tracker project of a policy is unset or does not exist
 */

export class UnknownProjectError extends Error {
  public readonly projectKey?: string;

  constructor(projectKey?: string) {
    super(
      projectKey
        ? `Tracker project ${projectKey} does not exist`
        : 'No tracker project is configured'
    );
    this.name = 'UnknownProjectError';
    this.projectKey = projectKey;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownProjectError);
    }
  }
}
