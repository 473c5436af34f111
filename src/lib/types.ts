/**
 * Shared types for issue export and import
 */

export type EntityState = 'open' | 'closed';

export interface Issue {
  readonly number: number | null;
  readonly title: string;
  readonly body: string | null;
  readonly labels: readonly string[];
  readonly state: EntityState;
  readonly assignees: readonly string[];
  readonly milestone: string | null;
  readonly url: string | null;
  readonly createdAt: string | null;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
}

export interface PullRequest {
  readonly number: number | null;
  readonly title: string;
  readonly body: string | null;
  readonly labels: readonly string[];
  readonly state: EntityState;
  readonly head: string | null; // source branch ref
  readonly base: string | null; // target branch ref
  readonly draft: boolean;
  readonly mergedAt: string | null;
  readonly url: string | null;
  readonly createdAt: string | null;
  readonly updatedAt: string | null;
  readonly closedAt: string | null;
}

/** Issue as written to an export file */
export interface IssueRecord {
  number: number | null;
  title: string;
  body: string | null;
  state: EntityState;
  labels: string[];
  assignees: string[];
  milestone: string | null;
  html_url: string | null;
  created_at: string | null;
  updated_at: string | null;
  closed_at: string | null;
}

/** Pull request as written to an export file */
export interface PullRequestRecord {
  number: number | null;
  title: string;
  body: string | null;
  state: EntityState;
  labels: string[];
  head: string | null;
  base: string | null;
  draft: boolean;
  merged_at: string | null;
  html_url: string | null;
  created_at: string | null;
  updated_at: string | null;
  closed_at: string | null;
}

/** Body of an issue creation call */
export interface IssueCreationPayload {
  title: string;
  body?: string;
  labels?: string[];
}

/**
 * Conversion between wire/file records and entities.
 * Issues and pull requests each have one; they share no class hierarchy.
 */
export interface EntityCodec<T, R> {
  parse(record: unknown): T;
  toRecord(entity: T): R;
}

export interface ExportBundle {
  issues: Issue[];
  prs?: PullRequest[];
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: unknown;
}

export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
  post(url: string, body: unknown, headers: Record<string, string>): Promise<HttpResponse>;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type PageResult =
  | { kind: 'collection'; records: unknown[] }
  | { kind: 'api-error'; status: number; code: string; message: string };

export interface ExportOptions {
  repo: string;
  outfile?: string;
  includePullRequests?: boolean;
  ignoreClosed?: boolean;
}

export interface ExportResult {
  outfile: string;
  written: boolean;
  issues: number;
  pullRequests: number | null; // null when not requested
}

export interface ImportOptions {
  repo: string;
  issuesFile: string;
  token: string;
  deleteIssues?: boolean;
  ignoreClosed?: boolean;
  dryRun?: boolean;
  /** Called with the planned issues before any are created; false aborts */
  confirm?: (planned: readonly Issue[]) => Promise<boolean>;
}

export interface ImportResult {
  remote: number;
  local: number;
  planned: Issue[];
  created: Array<{ title: string; number: number | null }>;
  nearMatches: NearMatch[];
  dryRun: boolean;
  aborted: boolean;
}

/** A missing local issue whose title is taken by a remote issue with another body */
export interface NearMatch {
  local: Issue;
  remote: Issue;
}
