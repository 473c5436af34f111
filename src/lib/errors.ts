/**
 * Error kinds surfaced by export and import runs
 */

export class IssuePorterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IssuePorterError';
  }
}

export class InvalidRepositoryUrlError extends IssuePorterError {
  constructor(readonly input: string) {
    super(`${input} is not a URL to a GitHub repository`);
    this.name = 'InvalidRepositoryUrlError';
  }
}

export class RepositoryNotFoundError extends IssuePorterError {
  constructor(readonly url: string) {
    super(`Could not find GitHub repository for ${url}`);
    this.name = 'RepositoryNotFoundError';
  }
}

export class UnexpectedResponseError extends IssuePorterError {
  constructor(
    readonly url: string,
    readonly status: number,
    detail: string
  ) {
    super(`Unexpected response from ${url} (HTTP ${status}): ${detail}`);
    this.name = 'UnexpectedResponseError';
  }
}

export class NetworkTimeoutError extends IssuePorterError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'NetworkTimeoutError';
  }
}

export class NetworkError extends IssuePorterError {
  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Request to ${url} failed: ${reason}`);
    this.name = 'NetworkError';
  }
}

/** A single record does not match the entity schema */
export class InvalidRecordError extends IssuePorterError {
  constructor(
    readonly kind: string,
    readonly reason: string
  ) {
    super(`Invalid ${kind} record: ${reason}`);
    this.name = 'InvalidRecordError';
  }
}

export class InvalidFileFormatError extends IssuePorterError {
  constructor(
    readonly file: string,
    reason: string
  ) {
    super(`Invalid issues file ${file}: ${reason}`);
    this.name = 'InvalidFileFormatError';
  }
}

/**
 * A creation call was rejected. `responseBody` is the server payload as received.
 */
export class RemoteWriteError extends IssuePorterError {
  constructor(
    readonly status: number,
    readonly title: string,
    readonly responseBody: unknown
  ) {
    super(`Failed to create issue "${title}" (HTTP ${status}): ${JSON.stringify(responseBody)}`);
    this.name = 'RemoteWriteError';
  }
}

export class UnsupportedOptionError extends IssuePorterError {
  constructor(readonly option: string) {
    super(`${option} is not supported yet`);
    this.name = 'UnsupportedOptionError';
  }
}

export class MissingTokenError extends IssuePorterError {
  constructor() {
    super('A GitHub token is required: pass it as an argument or set GITHUB_TOKEN');
    this.name = 'MissingTokenError';
  }
}

export class ConfigError extends IssuePorterError {
  constructor(details: string) {
    super(`Configuration validation failed:\n${details}`);
    this.name = 'ConfigError';
  }
}
