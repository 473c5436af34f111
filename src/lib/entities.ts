/**
 * Entity model: issues and pull requests normalized from REST API records
 * or export files, and converted back to file records.
 *
 * Both the API shape (labels as `{ name }`, assignees as `{ login }`) and the
 * flattened file shape parse through the same schema.
 */

import { z } from 'zod';
import { InvalidRecordError } from './errors';
import {
  EntityCodec,
  Issue,
  IssueCreationPayload,
  IssueRecord,
  PullRequest,
  PullRequestRecord,
} from './types';

const nullableString = z.string().nullish().transform((value) => value ?? null);

const labelSchema = z.union([z.string(), z.object({ name: z.string() }).passthrough()]);
const userSchema = z.union([z.string(), z.object({ login: z.string() }).passthrough()]);
const milestoneSchema = z.union([z.string(), z.object({ title: z.string() }).passthrough()]);
const branchSchema = z.union([z.string(), z.object({ ref: z.string() }).passthrough()]);

const baseFields = {
  number: z.number().int().positive().nullish().transform((value) => value ?? null),
  title: z.string().trim().min(1, 'title must not be empty'),
  body: nullableString,
  state: z.enum(['open', 'closed']).default('open'),
  labels: z.array(labelSchema).nullish().transform((labels) => normalizeLabels(labels ?? [])),
  html_url: nullableString,
  created_at: nullableString,
  updated_at: nullableString,
  closed_at: nullableString,
};

const issueSchema = z
  .object({
    ...baseFields,
    assignees: z
      .array(userSchema)
      .nullish()
      .transform((users) => (users ?? []).map((user) => (typeof user === 'string' ? user : user.login))),
    milestone: milestoneSchema
      .nullish()
      .transform((milestone) => (milestone == null ? null : typeof milestone === 'string' ? milestone : milestone.title)),
  })
  .passthrough();

const pullRequestSchema = z
  .object({
    ...baseFields,
    head: branchSchema.nullish().transform(toRef),
    base: branchSchema.nullish().transform(toRef),
    draft: z.boolean().nullish().transform((draft) => draft ?? false),
    merged_at: nullableString,
  })
  .passthrough();

function toRef(branch: z.infer<typeof branchSchema> | null | undefined): string | null {
  if (branch == null) return null;
  return typeof branch === 'string' ? branch : branch.ref;
}

/**
 * Labels have set semantics: names are de-duplicated and sorted
 */
export function normalizeLabels(labels: ReadonlyArray<z.infer<typeof labelSchema>>): string[] {
  const names = labels.map((label) => (typeof label === 'string' ? label : label.name)).filter((name) => name !== '');
  return [...new Set(names)].sort();
}

function describeZodError(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export const issueCodec: EntityCodec<Issue, IssueRecord> = {
  parse(record: unknown): Issue {
    const parsed = issueSchema.safeParse(record);
    if (!parsed.success) {
      throw new InvalidRecordError('issue', describeZodError(parsed.error));
    }

    const data = parsed.data;
    return Object.freeze({
      number: data.number,
      title: data.title,
      body: data.body,
      labels: Object.freeze(data.labels),
      state: data.state,
      assignees: Object.freeze(data.assignees),
      milestone: data.milestone,
      url: data.html_url,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
      closedAt: data.closed_at,
    });
  },

  toRecord(issue: Issue): IssueRecord {
    return {
      number: issue.number,
      title: issue.title,
      body: issue.body,
      state: issue.state,
      labels: [...issue.labels],
      assignees: [...issue.assignees],
      milestone: issue.milestone,
      html_url: issue.url,
      created_at: issue.createdAt,
      updated_at: issue.updatedAt,
      closed_at: issue.closedAt,
    };
  },
};

export const pullRequestCodec: EntityCodec<PullRequest, PullRequestRecord> = {
  parse(record: unknown): PullRequest {
    const parsed = pullRequestSchema.safeParse(record);
    if (!parsed.success) {
      throw new InvalidRecordError('pull request', describeZodError(parsed.error));
    }

    const data = parsed.data;
    return Object.freeze({
      number: data.number,
      title: data.title,
      body: data.body,
      labels: Object.freeze(data.labels),
      state: data.state,
      head: data.head,
      base: data.base,
      draft: data.draft,
      mergedAt: data.merged_at,
      url: data.html_url,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
      closedAt: data.closed_at,
    });
  },

  toRecord(pr: PullRequest): PullRequestRecord {
    return {
      number: pr.number,
      title: pr.title,
      body: pr.body,
      state: pr.state,
      labels: [...pr.labels],
      head: pr.head,
      base: pr.base,
      draft: pr.draft,
      merged_at: pr.mergedAt,
      html_url: pr.url,
      created_at: pr.createdAt,
      updated_at: pr.updatedAt,
      closed_at: pr.closedAt,
    };
  },
};

/**
 * The issues endpoint lists pull requests too; they carry a `pull_request` key
 */
export function isPullRequestRecord(record: unknown): boolean {
  return typeof record === 'object' && record !== null && 'pull_request' in record;
}

function normalizeBody(body: string | null): string {
  return (body ?? '').replace(/\r\n/g, '\n').trim();
}

/**
 * Content identity used for diffing. Remote numbers are never part of it,
 * since they differ between source and destination repositories.
 */
export function identityKey(entity: { title: string; body: string | null }): string {
  return JSON.stringify([entity.title.trim(), normalizeBody(entity.body)]);
}

export function issueCreationPayload(issue: Issue): IssueCreationPayload {
  const payload: IssueCreationPayload = { title: issue.title };

  if (issue.body !== null) payload.body = issue.body;
  if (issue.labels.length > 0) payload.labels = [...issue.labels];

  return payload;
}
