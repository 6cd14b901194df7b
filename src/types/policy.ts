/**
 * Repository policy types
 */

export interface RepoPolicy {
  /** Redmine project identifier that referenced issues must belong to */
  readonly trackerProject?: string;
  /** Whether every commit must reference an issue */
  readonly required: boolean;
  /** Additional Redmine project identifiers whose issues are accepted */
  readonly extraAcceptedProjects: ReadonlySet<string>;
  /** Prefix prepended to version names when setting the fix-version */
  readonly versionPrefix?: string;
}

/**
 * Maps GitHub logins to Redmine user ids
 */
export type UserDirectory = ReadonlyMap<string, number>;
