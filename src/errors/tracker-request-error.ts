/**
 * Error thrown when a Redmine API request fails
 */

export class TrackerRequestError extends Error {
  public readonly status?: number;
  public readonly url: string;
  public readonly cause?: Error;

  constructor(message: string, url: string, status?: number, cause?: Error) {
    super(message);
    this.name = 'TrackerRequestError';
    this.url = url;
    this.status = status;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrackerRequestError);
    }
  }
}
