/**
 * Commit types
 */

export interface Commit {
  readonly sha: string;
  readonly message: string;
  /** First line of the message */
  readonly subject: string;
  readonly fixes: ReadonlySet<number>;
  readonly refs: ReadonlySet<number>;
}
