/**
 * Policy Store
 *
 * Holds the per-repository validation policies loaded at startup. Repositories
 * without an entry fall back to a permissive default policy when their owner
 * is an allowed organization, and are rejected otherwise.
 */

import type { RepoPolicy } from '../types';
import { UnconfiguredRepositoryError } from '../errors';
import { logger } from '../utils/logger';

export const DEFAULT_POLICY: RepoPolicy = Object.freeze({
  required: false,
  extraAcceptedProjects: new Set<string>()
});

export class PolicyStore {
  private readonly policies: ReadonlyMap<string, RepoPolicy>;
  private readonly allowedOrganizations: ReadonlySet<string>;

  constructor(policies: ReadonlyMap<string, RepoPolicy>, allowedOrganizations: Iterable<string> = []) {
    this.policies = new Map(
      [...policies].map(([repository, policy]) => [repository, Object.freeze({ ...policy })])
    );
    this.allowedOrganizations = new Set(allowedOrganizations);
  }

  /**
   * Returns the policy for an "owner/repo" repository
   *
   * @throws {UnconfiguredRepositoryError} If the repository has no policy and its owner is not allowed
   */
  lookup(repository: string): RepoPolicy {
    const policy = this.policies.get(repository);
    if (policy) {
      return policy;
    }

    const [owner] = repository.split('/', 1);
    if (!owner || !this.allowedOrganizations.has(owner)) {
      logger.info('Repository is unconfigured and its owner is not allowed', { repository, owner });
      throw new UnconfiguredRepositoryError(repository);
    }

    return DEFAULT_POLICY;
  }

  has(repository: string): boolean {
    return this.policies.has(repository);
  }
}
