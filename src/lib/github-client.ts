/**
 * GitHub REST calls for a single repository
 */

import { AppConfig } from './config';
import { issueCodec, issueCreationPayload, isPullRequestRecord, pullRequestCodec } from './entities';
import { RemoteWriteError } from './errors';
import { fetchCollection } from './paginated-fetcher';
import { HttpTransport, Issue, Logger, PullRequest, RepositoryRef } from './types';

export class GitHubClient {
  private transport: HttpTransport;
  private ref: RepositoryRef;
  private config: AppConfig;
  private logger: Logger;

  constructor(transport: HttpTransport, ref: RepositoryRef, config: AppConfig, logger: Logger) {
    this.transport = transport;
    this.ref = ref;
    this.config = config;
    this.logger = logger;
  }

  get fullName(): string {
    return `${this.ref.owner}/${this.ref.repo}`;
  }

  issuesUrl(): string {
    return `${this.repoApiUrl()}/issues`;
  }

  pullsUrl(): string {
    return `${this.repoApiUrl()}/pulls`;
  }

  /**
   * All issues, open and closed. Pull requests listed by the issues
   * endpoint are left out.
   */
  async listIssues(): Promise<Issue[]> {
    return fetchCollection(this.transport, this.listingUrl(this.issuesUrl()), (record) => issueCodec.parse(record), {
      logger: this.logger,
      include: (record) => !isPullRequestRecord(record),
    });
  }

  async listPullRequests(): Promise<PullRequest[]> {
    return fetchCollection(
      this.transport,
      this.listingUrl(this.pullsUrl()),
      (record) => pullRequestCodec.parse(record),
      { logger: this.logger }
    );
  }

  /**
   * Create an issue and return the number the server assigned
   */
  async createIssue(issue: Issue, token: string): Promise<number | null> {
    const response = await this.transport.post(this.issuesUrl(), issueCreationPayload(issue), {
      Authorization: `Bearer ${token}`,
      'X-GitHub-Api-Version': this.config.apiVersion,
      Accept: 'application/vnd.github+json',
    });

    if (response.status >= 300) {
      throw new RemoteWriteError(response.status, issue.title, response.body);
    }

    const body = response.body;
    if (typeof body === 'object' && body !== null && 'number' in body && typeof body.number === 'number') {
      return body.number;
    }
    return null;
  }

  private repoApiUrl(): string {
    const owner = encodeURIComponent(this.ref.owner);
    const repo = encodeURIComponent(this.ref.repo);
    return `${this.config.apiBaseUrl}/repos/${owner}/${repo}`;
  }

  private listingUrl(base: string): string {
    return `${base}?state=all&per_page=${this.config.perPage}`;
  }
}
