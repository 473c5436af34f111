/**
 * Cursor-following retrieval of collection resources
 */

import { InvalidRecordError, RepositoryNotFoundError, UnexpectedResponseError } from './errors';
import { silentLogger } from './logger';
import { HttpResponse, HttpTransport, Logger, PageResult } from './types';

export interface FetchCollectionOptions {
  logger?: Logger;
  /** Records rejected here are skipped before parsing */
  include?: (record: unknown) => boolean;
}

/**
 * Classify a raw response as a page of records or an API error
 */
export function classifyResponse(response: HttpResponse): PageResult {
  if (response.status < 300 && Array.isArray(response.body)) {
    return { kind: 'collection', records: response.body };
  }

  const body: object = typeof response.body === 'object' && response.body !== null ? response.body : {};
  const statusField = 'status' in body ? body.status : undefined;
  const messageField = 'message' in body ? body.message : undefined;

  return {
    kind: 'api-error',
    status: response.status,
    code: statusField === undefined ? String(response.status) : String(statusField),
    message: typeof messageField === 'string' ? messageField : 'response body is not a collection',
  };
}

/**
 * Extract the `rel="next"` URL from a `link` header, if any
 */
export function parseNextLink(header: string | undefined): string | null {
  if (!header) return null;

  for (const segment of header.split(',')) {
    const match = segment.match(/<([^>]+)>\s*;(.*)$/);
    if (!match) continue;

    const rel = match[2].match(/rel\s*=\s*"?([^";]+)"?/);
    if (rel && rel[1].split(/\s+/).includes('next')) {
      return match[1].trim();
    }
  }

  return null;
}

/**
 * Request `startUrl` and every page it links to, parsing each record in order.
 * A link back to a page already requested ends the walk.
 */
export async function fetchCollection<T>(
  transport: HttpTransport,
  startUrl: string,
  parse: (record: unknown) => T,
  options: FetchCollectionOptions = {}
): Promise<T[]> {
  const logger = options.logger ?? silentLogger;
  const entities: T[] = [];
  const seen = new Set<string>();
  let currentUrl: string | null = startUrl;

  while (currentUrl) {
    seen.add(currentUrl);
    logger.debug(`GET ${currentUrl}`);

    const response = await transport.get(currentUrl);
    const page = classifyResponse(response);

    if (page.kind === 'api-error') {
      if (page.code === '404' || page.status === 404) {
        throw new RepositoryNotFoundError(currentUrl);
      }
      throw new UnexpectedResponseError(currentUrl, page.status, page.message);
    }

    for (const record of page.records) {
      if (options.include && !options.include(record)) continue;

      try {
        entities.push(parse(record));
      } catch (error: unknown) {
        if (error instanceof InvalidRecordError) {
          throw new UnexpectedResponseError(currentUrl, response.status, error.message);
        }
        throw error;
      }
    }

    const nextUrl = parseNextLink(response.headers['link']);
    if (nextUrl && seen.has(nextUrl)) {
      logger.warn(`Pagination loops back to ${nextUrl}, stopping`);
      currentUrl = null;
    } else {
      currentUrl = nextUrl;
    }
  }

  logger.debug(`Fetched ${entities.length} record(s) from ${seen.size} page(s)`);
  return entities;
}
