import { describe, it, expect } from 'vitest';
import {
  INTERNAL_ERROR_REPORT,
  MULTI_SECTION_TITLE,
  UNKNOWN_REPOSITORY_REPORT,
  buildCheckReport,
  formatDetails,
  formatInvalidCommits,
  formatIssues,
  type ValidationFindings
} from './check-report';
import { parseCommit } from './commit-parser';
import { makeIssue, makeProject } from '../testing/fakes';

describe('check report', () => {
  const foo = makeProject(1, 'foo', 'Foo');
  const bar = makeProject(2, 'bar', 'Bar');

  const empty: ValidationFindings = {
    invalidCommits: [],
    invalidProjectIssues: [],
    missingIssueIds: [],
    validIssues: [],
    project: foo
  };

  describe('formatters', () => {
    it('should format invalid commits', () => {
      expect(formatInvalidCommits([parseCommit('deadbeef', 'improve logging')])).toEqual([
        'deadbeef must be in the format `fixes #redmine - brief description`'
      ]);
    });

    it('should format issues as sorted links', () => {
      const issues = [makeIssue(20, foo, { subject: 'Second' }), makeIssue(3, foo, { subject: 'First' })];

      expect(formatIssues(issues)).toEqual([
        '[#3: First](https://redmine.example.test/issues/3)',
        '[#20: Second](https://redmine.example.test/issues/20)'
      ]);
    });

    it('should format remediation details for wrong-project issues', () => {
      const text = formatDetails([makeIssue(55, bar, { subject: 'Crash' })], foo);

      expect(text).toBe(
        '### [#55: Crash](https://redmine.example.test/issues/55)\n' +
        '\n' +
        '* check [#55](https://redmine.example.test/issues/55) is the intended issue\n' +
        '* move [ticket #55](https://redmine.example.test/issues/55) from Bar to the Foo project\n' +
        '* or file a new ticket in the [Foo project](https://redmine.example.test/projects/foo/issues/new)\n'
      );
    });

    it('should return no details without a project', () => {
      expect(formatDetails([makeIssue(55, bar)], undefined)).toBe('');
    });
  });

  describe('buildCheckReport', () => {
    it('should succeed with a single valid issues section', () => {
      const report = buildCheckReport({
        ...empty,
        validIssues: [makeIssue(123, foo, { subject: 'Crash on start' })]
      });

      expect(report).toEqual({
        conclusion: 'success',
        output: {
          title: 'Valid issues',
          summary: '* [#123: Crash on start](https://redmine.example.test/issues/123)'
        }
      });
    });

    it('should fail with invalid commits', () => {
      const report = buildCheckReport({
        ...empty,
        invalidCommits: [parseCommit('sha1', 'improve logging')]
      });

      expect(report.conclusion).toBe('failure');
      expect(report.output.title).toBe('Invalid commits');
      expect(report.output.summary).toBe('* sha1 must be in the format `fixes #redmine - brief description`');
      expect(report.output).not.toHaveProperty('text');
    });

    it('should use headers when several sections are present', () => {
      const report = buildCheckReport({
        ...empty,
        missingIssueIds: [7, 99],
        validIssues: [makeIssue(1, foo, { subject: 'One' })]
      });

      expect(report.conclusion).toBe('failure');
      expect(report.output.title).toBe(MULTI_SECTION_TITLE);
      expect(report.output.summary).toBe(
        '### Issues not found in redmine\n' +
        '* #7\n' +
        '* #99\n' +
        '### Valid issues\n' +
        '* [#1: One](https://redmine.example.test/issues/1)'
      );
    });

    it('should include remediation text for wrong-project issues', () => {
      const report = buildCheckReport({
        ...empty,
        invalidProjectIssues: [makeIssue(55, bar, { subject: 'Crash' })]
      });

      expect(report.conclusion).toBe('failure');
      expect(report.output.title).toBe('Invalid project');
      expect(report.output.summary).toBe('* [#55: Crash](https://redmine.example.test/issues/55)');
      expect(report.output.text).toContain('from Bar to the Foo project');
    });

    it('should succeed when nothing is referenced', () => {
      const report = buildCheckReport(empty);

      expect(report).toEqual({
        conclusion: 'success',
        output: { title: MULTI_SECTION_TITLE, summary: 'No issues referenced' }
      });
    });

    it('should send an empty text to clear a previous one', () => {
      const report = buildCheckReport({ ...empty, validIssues: [makeIssue(1, foo)] }, 'old details');

      expect(report.output.text).toBe('');
    });

    it('should omit the text when neither the old nor the new one has content', () => {
      expect(buildCheckReport(empty, null).output).not.toHaveProperty('text');
      expect(buildCheckReport(empty, '').output).not.toHaveProperty('text');
    });
  });

  describe('fixed reports', () => {
    it('should fail for unknown repositories and internal errors', () => {
      expect(UNKNOWN_REPOSITORY_REPORT.conclusion).toBe('failure');
      expect(UNKNOWN_REPOSITORY_REPORT.output.title).toBe('Unknown repository');
      expect(INTERNAL_ERROR_REPORT).toEqual({
        conclusion: 'failure',
        output: { title: 'Internal error while testing', summary: 'Please retry later' }
      });
    });
  });
});
