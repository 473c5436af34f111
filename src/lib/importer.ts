/**
 * Import issues from an export file into a repository.
 *
 * Only issues that are missing remotely (by title and body, never by number)
 * are created. The first rejected creation stops the run.
 */

import { readBundleFile } from './bundle';
import { AppConfig } from './config';
import { MissingTokenError, UnsupportedOptionError } from './errors';
import { GitHubClient } from './github-client';
import { computeMissing, findNearMatches } from './reconcile';
import { parseOwnerAndRepo } from './repo-locator';
import { HttpTransport, ImportOptions, ImportResult, Logger } from './types';

export interface ImportDependencies {
  transport: HttpTransport;
  config: AppConfig;
  logger: Logger;
}

export async function runImport(options: ImportOptions, deps: ImportDependencies): Promise<ImportResult> {
  const { transport, config, logger } = deps;

  if (options.deleteIssues) {
    throw new UnsupportedOptionError('--delete-issues');
  }
  if (!options.token.trim()) {
    throw new MissingTokenError();
  }

  const ref = parseOwnerAndRepo(options.repo, config.webBaseUrl);
  const github = new GitHubClient(transport, ref, config, logger);

  // Read the file before any network call so a bad file never touches the remote
  let local = readBundleFile(options.issuesFile).issues;
  logger.info(`Found ${local.length} issues in file ${options.issuesFile}`);

  if (options.ignoreClosed) {
    local = local.filter((issue) => issue.state !== 'closed');
    logger.debug(`Keeping ${local.length} open local issues`);
  }

  const remote = await github.listIssues();
  logger.info(`Found ${remote.length} issues in GitHub repo ${github.fullName}`);

  const planned = computeMissing(local, remote);
  const nearMatches = findNearMatches(planned, remote);
  logger.info(`${planned.length} issues to import`);

  for (const match of nearMatches) {
    const number = match.remote.number === null ? '' : ` #${match.remote.number}`;
    logger.warn(`"${match.local.title}" differs from existing issue${number} with the same title`);
  }

  const result: ImportResult = {
    remote: remote.length,
    local: local.length,
    planned,
    created: [],
    nearMatches,
    dryRun: Boolean(options.dryRun),
    aborted: false,
  };

  if (options.dryRun || planned.length === 0) {
    return result;
  }

  if (options.confirm && !(await options.confirm(planned))) {
    logger.warn('Import cancelled, no issues created');
    result.aborted = true;
    return result;
  }

  for (const issue of planned) {
    const number = await github.createIssue(issue, options.token);
    result.created.push({ title: issue.title, number });
    logger.info(`Imported issue ${issue.title}`);
  }

  logger.info(`Imported ${result.created.length} missing issues`);
  return result;
}
