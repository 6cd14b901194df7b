/**
 * Redmine Tracker
 *
 * Tracker implementation on the Redmine REST API. Responses are validated
 * before they are turned into domain objects.
 */

import { z } from 'zod';
import type { Issue, IssueUpdate, Project, Tracker, Version } from '../types';
import { TrackerRequestError } from '../errors';
import { logger } from '../utils/logger';

/** Redmine caps page sizes at 100 */
const MAX_PAGE_SIZE = 100;

const ProjectResponseSchema = z.object({
  project: z.object({
    id: z.number().int(),
    identifier: z.string(),
    name: z.string()
  })
});

const IssueSchema = z.object({
  id: z.number().int(),
  subject: z.string(),
  project: z.object({ id: z.number().int(), name: z.string() }),
  status: z.object({ id: z.number().int() }),
  assigned_to: z.object({ id: z.number().int() }).optional(),
  fixed_version: z.object({ id: z.number().int() }).optional(),
  custom_fields: z
    .array(
      z.object({
        id: z.number().int(),
        name: z.string(),
        value: z.union([z.string(), z.array(z.string()), z.null()]).optional()
      })
    )
    .default([])
});

const IssuesResponseSchema = z.object({ issues: z.array(IssueSchema) });

const VersionsResponseSchema = z.object({
  versions: z.array(
    z.object({
      id: z.number().int(),
      name: z.string(),
      status: z.enum(['open', 'locked', 'closed'])
    })
  )
});

export interface RedmineTrackerConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly fetch?: typeof fetch;
}

export class RedmineTracker implements Tracker {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: typeof fetch;

  constructor(config: RedmineTrackerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.fetchFn = config.fetch ?? fetch;
  }

  async getProject(identifier: string): Promise<Project | undefined> {
    const body = await this.request(`/projects/${encodeURIComponent(identifier)}.json`, { allowNotFound: true });
    if (body === undefined) {
      return undefined;
    }

    const { project } = this.parse(ProjectResponseSchema, body, 'project');
    return {
      id: project.id,
      identifier: project.identifier,
      name: project.name,
      url: `${this.baseUrl}/projects/${project.identifier}`
    };
  }

  async getIssues(ids: readonly number[]): Promise<Issue[]> {
    const issues: Issue[] = [];

    for (let offset = 0; offset < ids.length; offset += MAX_PAGE_SIZE) {
      const chunk = ids.slice(offset, offset + MAX_PAGE_SIZE);
      const query = new URLSearchParams({
        issue_id: chunk.join(','),
        status_id: '*',
        limit: String(chunk.length)
      });
      const body = await this.request(`/issues.json?${query.toString()}`);
      const parsed = this.parse(IssuesResponseSchema, body, 'issues');
      issues.push(...parsed.issues.map(issue => this.toIssue(issue)));
    }

    return issues;
  }

  async getVersions(projectId: number): Promise<Version[]> {
    const body = await this.request(`/projects/${projectId}/versions.json`);
    return this.parse(VersionsResponseSchema, body, 'versions').versions;
  }

  async updateIssue(id: number, update: IssueUpdate): Promise<void> {
    await this.request(`/issues/${id}.json`, {
      method: 'PUT',
      body: {
        issue: {
          status_id: update.statusId,
          assigned_to_id: update.assignedToId,
          fixed_version_id: update.fixedVersionId,
          custom_fields: update.customFields
        }
      }
    });
  }

  private toIssue(issue: z.infer<typeof IssueSchema>): Issue {
    return {
      id: issue.id,
      subject: issue.subject,
      url: `${this.baseUrl}/issues/${issue.id}`,
      project: issue.project,
      statusId: issue.status.id,
      assigneeId: issue.assigned_to?.id,
      fixedVersionId: issue.fixed_version?.id,
      customFields: issue.custom_fields.map(field => ({
        id: field.id,
        name: field.name,
        value: field.value ?? null
      }))
    };
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, resource: string): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TrackerRequestError(
        `Unexpected Redmine ${resource} response: ${result.error.issues.map(issue => issue.message).join('; ')}`,
        this.baseUrl
      );
    }
    return result.data;
  }

  private async request(
    path: string,
    options: { method?: string; body?: unknown; allowNotFound?: boolean } = {}
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const method = options.method ?? 'GET';

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          'X-Redmine-API-Key': this.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json'
        },
        ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {})
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TrackerRequestError(
        `Redmine request ${method} ${path} failed: ${message}`,
        url,
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    if (response.status === 404 && options.allowNotFound) {
      logger.debug('Redmine resource not found', { path });
      return undefined;
    }

    if (!response.ok) {
      throw new TrackerRequestError(
        `Redmine API error: ${response.status} ${response.statusText}`,
        url,
        response.status
      );
    }

    const text = await response.text();
    return text ? JSON.parse(text) : undefined;
  }
}
