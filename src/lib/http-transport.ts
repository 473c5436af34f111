/**
 * HTTP transport backed by Octokit's request function
 */

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { NetworkError, NetworkTimeoutError } from './errors';
import { HttpResponse, HttpTransport, Logger } from './types';

export interface OctokitTransportOptions {
  token?: string;
  timeoutMs: number;
  logger: Logger;
  userAgent?: string;
}

type RawHeaders = Record<string, string | number | undefined>;

function normalizeHeaders(headers: RawHeaders | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value !== undefined) {
      normalized[name.toLowerCase()] = String(value);
    }
  }
  return normalized;
}

export class OctokitTransport implements HttpTransport {
  private octokit: Octokit;
  private timeoutMs: number;
  private token?: string;

  constructor(options: OctokitTransportOptions) {
    const { logger } = options;

    // No `auth` here: Octokit's token hook would replace an explicit Authorization header
    this.octokit = new Octokit({
      userAgent: options.userAgent ?? 'issue-porter',
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.error(message),
      },
    });
    this.timeoutMs = options.timeoutMs;
    this.token = options.token;
  }

  async get(url: string): Promise<HttpResponse> {
    return this.send('GET', url);
  }

  async post(url: string, body: unknown, headers: Record<string, string>): Promise<HttpResponse> {
    return this.send('POST', url, body, headers);
  }

  /**
   * Error statuses come back as responses; only transport failures throw
   */
  private async send(
    method: 'GET' | 'POST',
    url: string,
    body?: unknown,
    headers: Record<string, string> = {}
  ): Promise<HttpResponse> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await this.octokit.request({
        method,
        url,
        headers: this.withAuthorization(headers),
        ...(body === undefined ? {} : { data: body }),
        request: { signal },
      });

      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: response.data,
      };
    } catch (error: unknown) {
      if (signal.aborted) {
        throw new NetworkTimeoutError(url, this.timeoutMs);
      }

      if (error instanceof RequestError && error.response) {
        return {
          status: error.status,
          headers: normalizeHeaders(error.response.headers),
          body: error.response.data,
        };
      }

      throw new NetworkError(url, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Bearer auth from the transport token, unless the caller set its own
   */
  private withAuthorization(headers: Record<string, string>): Record<string, string> {
    const hasAuthorization = Object.keys(headers).some((name) => name.toLowerCase() === 'authorization');
    if (!this.token || hasAuthorization) {
      return headers;
    }
    return { ...headers, authorization: `Bearer ${this.token}` };
  }
}
