/**
 * Repository URL validation and owner/repo extraction
 */

import { DEFAULT_CONFIG } from './config';
import { InvalidRepositoryUrlError } from './errors';
import { RepositoryRef } from './types';

function countSlashes(value: string): number {
  return value.split('/').length - 1;
}

/**
 * Drop a `?query` suffix and one trailing slash
 */
function trimRepositoryUrl(url: string): string {
  const withoutParams = url.split('?')[0];
  return withoutParams.endsWith('/') ? withoutParams.slice(0, -1) : withoutParams;
}

/**
 * True when `url` points at `<base>/<owner>/<repo>`. One extra path separator
 * is tolerated, matching what the hosting site links to.
 */
export function isRepositoryUrl(url: string, baseUrl: string = DEFAULT_CONFIG.webBaseUrl): boolean {
  if (!url.startsWith(baseUrl)) {
    return false;
  }

  const trimmed = trimRepositoryUrl(url);
  const baseSlashes = countSlashes(baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  const slashes = countSlashes(trimmed);

  if (slashes < baseSlashes + 1 || slashes > baseSlashes + 2) {
    return false;
  }

  const [owner, repo] = trimmed.split('/').slice(-2);
  return owner !== '' && repo !== '';
}

export function parseOwnerAndRepo(url: string, baseUrl: string = DEFAULT_CONFIG.webBaseUrl): RepositoryRef {
  if (!isRepositoryUrl(url, baseUrl)) {
    throw new InvalidRepositoryUrlError(url);
  }

  const [owner, repo] = trimRepositoryUrl(url).split('/').slice(-2);
  return { owner, repo };
}
