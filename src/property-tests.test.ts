/**
 * Property-based tests
 *
 * Properties of parsing, verification, reporting and reconciliation that must
 * hold for any input, checked with fast-check.
 */

import { describe, it, expect, vi } from 'vitest';
import * as fc from 'fast-check';
import { parseCommit } from './components/commit-parser';
import { IssueVerifier } from './components/issue-verifier';
import { buildCheckReport } from './components/check-report';
import { TrackerReconciler } from './components/tracker-reconciler';
import { retryWithBackoff } from './utils/retry';
import { FakeTracker, makeIssue, makeProject, makePullRequest } from './testing/fakes';

vi.mock('./utils/logger');

const foo = makeProject(1, 'foo', 'Foo');
const bar = makeProject(2, 'bar', 'Bar');
const baz = makeProject(3, 'baz', 'Baz');

describe('Property-Based Tests', () => {
  describe('Commit parsing', () => {
    const referenceList = fc.array(fc.nat({ max: 1_000_000 }), { minLength: 1, maxLength: 5 });

    it('should extract every referenced id from a well-formed subject', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('fixes', 'Fixes', 'FIXES', 'refs', 'Refs', 'REFS'),
          referenceList,
          fc.constantFrom(', ', ','),
          fc.constantFrom(':', ' -'),
          fc.string(),
          (action, ids, listSeparator, separator, description) => {
            const subject = `${action} ${ids.map(id => `#${id}`).join(listSeparator)}${separator} ${description}`;
            const commit = parseCommit('sha1', `${subject}\n\nbody`);

            const isFix = action.toLowerCase() === 'fixes';
            expect(commit.subject).toBe(subject);
            expect([...(isFix ? commit.fixes : commit.refs)].sort((a, b) => a - b))
              .toEqual([...new Set(ids)].sort((a, b) => a - b));
            expect((isFix ? commit.refs : commit.fixes).size).toBe(0);
          }
        ),
        { numRuns: 200 }
      );
    });

    it('should find no references in subjects without an action word', () => {
      fc.assert(
        fc.property(
          fc.string().filter(subject => !/^(fixes|refs) /i.test(subject)),
          referenceList,
          (subject, ids) => {
            const commit = parseCommit('sha1', `${subject}\nfixes ${ids.map(id => `#${id}`).join(', ')}: later line`);

            return commit.fixes.size === 0 && commit.refs.size === 0;
          }
        ),
        { numRuns: 200 }
      );
    });
  });

  describe('Issue verification', () => {
    const issueArbitrary = fc.record({
      id: fc.integer({ min: 1, max: 40 }),
      project: fc.constantFrom(foo, bar, baz)
    });

    it('should partition requested ids into disjoint sorted groups', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.array(issueArbitrary, { maxLength: 20 }),
          fc.array(fc.integer({ min: 1, max: 40 }), { maxLength: 20 }),
          async (existing, requested) => {
            const tracker = new FakeTracker();
            tracker.addProject(foo);
            tracker.addProject(bar);
            tracker.addProject(baz);
            existing.forEach(({ id, project }) => tracker.addIssue(makeIssue(id, project)));

            const result = await new IssueVerifier(tracker).verify(
              { trackerProject: 'foo', required: true, extraAcceptedProjects: new Set(['bar']) },
              requested
            );

            const valid = result.validIssues.map(issue => issue.id);
            const invalid = result.invalidProjectIssues.map(issue => issue.id);
            const missing = [...result.missingIssueIds];
            const expected = [...new Set(requested)].sort((a, b) => a - b);

            expect([...valid, ...invalid, ...missing].sort((a, b) => a - b)).toEqual(expected);
            for (const ids of [valid, invalid, missing]) {
              expect(ids).toEqual([...ids].sort((a, b) => a - b));
            }
            expect(result.validIssues.every(issue => issue.project.id !== baz.id)).toBe(true);
            expect(result.invalidProjectIssues.every(issue => issue.project.id === baz.id)).toBe(true);
            expect(missing.every(id => !tracker.issues.has(id))).toBe(true);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Check conclusion', () => {
    it('should succeed only when every finding is a valid issue', () => {
      fc.assert(
        fc.property(
          fc.nat({ max: 3 }),
          fc.nat({ max: 3 }),
          fc.nat({ max: 3 }),
          fc.nat({ max: 3 }),
          (invalidCommits, invalidProject, missing, valid) => {
            const report = buildCheckReport({
              invalidCommits: Array.from({ length: invalidCommits }, (_, i) => parseCommit(`sha${i}`, 'wip')),
              invalidProjectIssues: Array.from({ length: invalidProject }, (_, i) => makeIssue(100 + i, baz)),
              missingIssueIds: Array.from({ length: missing }, (_, i) => 200 + i),
              validIssues: Array.from({ length: valid }, (_, i) => makeIssue(300 + i, foo)),
              project: foo
            });

            const clean = invalidCommits === 0 && invalidProject === 0 && missing === 0;
            expect(report.conclusion).toBe(clean ? 'success' : 'failure');
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Reconciliation', () => {
    it('should write nothing when run again on the same pull request', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.integer({ min: 1, max: 8 }),
          fc.option(fc.integer({ min: 1, max: 200 }), { nil: undefined }),
          fc.array(fc.webUrl(), { maxLength: 3 }),
          fc.constantFrom('Fix crash on startup', 'CP Fix crash', '[CP] Fix crash', 'Cherry picks for 3.0'),
          fc.constantFrom('alice-dev', 'stranger'),
          async (statusId, assigneeId, linked, title, author) => {
            const tracker = new FakeTracker();
            const issue = tracker.addIssue(makeIssue(10, foo, {
              statusId,
              assigneeId,
              customFields: [{ id: 7, name: 'Pull request', value: linked }]
            }));
            const reconciler = new TrackerReconciler(tracker, new Map([['alice-dev', 101]]));
            const pullRequest = makePullRequest({ title, author });

            await reconciler.reconcile(pullRequest, [issue]);
            const writes = tracker.updates.length;
            const current = tracker.issues.get(10);
            const second = await reconciler.reconcile(pullRequest, current ? [current] : []);

            expect(writes).toBeLessThanOrEqual(1);
            expect(tracker.updates).toHaveLength(writes);
            expect(second.updated).toEqual([]);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Retry', () => {
    it('should never exceed the maximum number of attempts', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 1, max: 5 }), async maxAttempts => {
          let attempts = 0;

          await expect(retryWithBackoff(async () => {
            attempts++;
            throw new Error('Always fails');
          }, { maxAttempts, delayMs: 0 })).rejects.toThrow(`after ${maxAttempts} attempts`);

          expect(attempts).toBe(maxAttempts);
        }),
        { numRuns: 20 }
      );
    });
  });
});
