/**
 * Local/remote reconciliation by content identity
 */

import { identityKey } from './entities';
import { Issue, NearMatch } from './types';

/**
 * Local issues with no remote counterpart, in local order.
 * Duplicates (by identity key) collapse to their first occurrence.
 */
export function computeMissing(local: readonly Issue[], remote: readonly Issue[]): Issue[] {
  const known = new Set(remote.map((issue) => identityKey(issue)));
  const missing: Issue[] = [];

  for (const issue of local) {
    const key = identityKey(issue);
    if (known.has(key)) continue;

    known.add(key);
    missing.push(issue);
  }

  return missing;
}

/**
 * Missing issues whose title already exists remotely with a different body
 */
export function findNearMatches(missing: readonly Issue[], remote: readonly Issue[]): NearMatch[] {
  const byTitle = new Map<string, Issue>();
  for (const issue of remote) {
    const title = issue.title.trim();
    if (!byTitle.has(title)) byTitle.set(title, issue);
  }

  const matches: NearMatch[] = [];
  for (const issue of missing) {
    const counterpart = byTitle.get(issue.title.trim());
    if (counterpart) {
      matches.push({ local: issue, remote: counterpart });
    }
  }
  return matches;
}
