/**
 * Export issues (and optionally pull requests) from a repository to a JSON file
 */

import { writeBundleFile } from './bundle';
import { AppConfig } from './config';
import { GitHubClient } from './github-client';
import { parseOwnerAndRepo } from './repo-locator';
import { ExportBundle, ExportOptions, ExportResult, HttpTransport, Logger } from './types';

export interface ExportDependencies {
  transport: HttpTransport;
  config: AppConfig;
  logger: Logger;
}

export async function runExport(options: ExportOptions, deps: ExportDependencies): Promise<ExportResult> {
  const { transport, config, logger } = deps;

  const ref = parseOwnerAndRepo(options.repo, config.webBaseUrl);
  const github = new GitHubClient(transport, ref, config, logger);
  const outfile = options.outfile || `${ref.repo}.json`;

  let issues = await github.listIssues();
  logger.info(`Found ${issues.length} issues in GitHub repo ${github.fullName}`);

  const bundle: ExportBundle = { issues };

  if (options.includePullRequests) {
    const prs = await github.listPullRequests();
    logger.info(`Found ${prs.length} pull requests in GitHub repo ${github.fullName}`);
    bundle.prs = prs;
  }

  if (options.ignoreClosed) {
    issues = issues.filter((issue) => issue.state !== 'closed');
    bundle.issues = issues;
    bundle.prs = bundle.prs?.filter((pr) => pr.state !== 'closed');
    logger.debug(`Keeping ${issues.length} open issues`);
  }

  const pullRequests = bundle.prs ? bundle.prs.length : null;

  if (bundle.issues.length === 0 && !pullRequests) {
    logger.warn('No issues found, not writing anything');
    return { outfile, written: false, issues: 0, pullRequests };
  }

  writeBundleFile(outfile, bundle);
  logger.info(`Issues written to file ${outfile}`);

  return { outfile, written: true, issues: bundle.issues.length, pullRequests };
}
