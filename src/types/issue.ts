/**
 * Redmine issue, project and version types
 */

export interface ProjectRef {
  readonly id: number;
  readonly name: string;
}

export interface Project extends ProjectRef {
  readonly identifier: string;
  readonly url: string;
}

export type CustomFieldValue = string | string[] | null;

export interface CustomField {
  readonly id: number;
  readonly name: string;
  readonly value: CustomFieldValue;
}

export interface Issue {
  readonly id: number;
  readonly subject: string;
  readonly url: string;
  readonly project: ProjectRef;
  readonly statusId: number;
  readonly assigneeId?: number;
  readonly fixedVersionId?: number;
  readonly customFields: readonly CustomField[];
}

export type VersionStatus = 'open' | 'locked' | 'closed';

export interface Version {
  readonly id: number;
  readonly name: string;
  readonly status: VersionStatus;
}

/**
 * Partial issue update; only the fields present are written
 */
export interface IssueUpdate {
  readonly statusId?: number;
  readonly assignedToId?: number;
  readonly fixedVersionId?: number;
  readonly customFields?: ReadonlyArray<{ readonly id: number; readonly value: CustomFieldValue }>;
}

export interface IssueVerificationResult {
  readonly project: Project;
  readonly validIssues: readonly Issue[];
  readonly invalidProjectIssues: readonly Issue[];
  readonly missingIssueIds: readonly number[];
}

export const IssueStatus = {
  NEW: 1,
  ASSIGNED: 2,
  RESOLVED: 3,
  FEEDBACK: 4,
  CLOSED: 5,
  REJECTED: 6,
  READY_FOR_TESTING: 7,
  DUPLICATE: 8
} as const;

export const CustomFieldId = {
  PULL_REQUEST: 7
} as const;

const CLOSED_STATUSES: ReadonlySet<number> = new Set([
  IssueStatus.RESOLVED,
  IssueStatus.CLOSED,
  IssueStatus.REJECTED,
  IssueStatus.DUPLICATE
]);

const REJECTED_STATUSES: ReadonlySet<number> = new Set([
  IssueStatus.REJECTED,
  IssueStatus.DUPLICATE
]);

export function isClosedStatus(statusId: number): boolean {
  return CLOSED_STATUSES.has(statusId);
}

export function isRejectedStatus(statusId: number): boolean {
  return REJECTED_STATUSES.has(statusId);
}
