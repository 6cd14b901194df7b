/**
 * Error thrown when configuration is missing or invalid
 */

export class ConfigurationError extends Error {
  public readonly validationErrors: string[];
  public readonly cause?: Error;

  constructor(message: string, validationErrors: string[], cause?: Error) {
    super(message);
    this.name = 'ConfigurationError';
    this.validationErrors = validationErrors;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}
