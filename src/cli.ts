#!/usr/bin/env node

/**
 * issue-porter CLI
 *
 * Export GitHub issues to a JSON file and import missing ones back
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import inquirer from 'inquirer';
import path from 'path';
import { config as loadEnv } from 'dotenv';
import { AppConfig, loadConfig } from './lib/config';
import { runExport } from './lib/exporter';
import { OctokitTransport } from './lib/http-transport';
import { runImport } from './lib/importer';
import { createConsoleLogger } from './lib/logger';
import { printExportResult, printImportResult, printNearMatches } from './lib/report';
import { Issue, Logger } from './lib/types';

// Load environment variables from the directory the command runs in
loadEnv({ path: path.join(process.cwd(), '.env.local') });
loadEnv({ path: path.join(process.cwd(), '.env') });

interface ExportCommandOptions {
  outfile?: string;
  pullRequests?: boolean;
  ignoreClosed?: boolean;
  token?: string;
  verbose?: boolean;
}

interface ImportCommandOptions {
  deleteIssues?: boolean;
  ignoreClosed?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
}

function setup(verbose: boolean, spinner: Ora, token?: string): { config: AppConfig; logger: Logger; transport: OctokitTransport } {
  const config = loadConfig();
  const logger = createConsoleLogger({ verbose, spinner });
  const transport = new OctokitTransport({ token: token ?? config.token, timeoutMs: config.timeoutMs, logger });
  return { config, logger, transport };
}

function fail(spinner: Ora, label: string, error: unknown, verbose: boolean): never {
  spinner.fail(label);
  if (error instanceof Error) {
    const kind = verbose ? chalk.gray(` (${error.name})`) : '';
    console.error(chalk.red(`\nError: ${error.message}`) + kind);
  } else {
    console.error(chalk.red(`\nError: ${String(error)}`));
  }
  process.exit(1);
}

async function confirmImport(spinner: Ora, planned: readonly Issue[]): Promise<boolean> {
  spinner.stop();
  console.log(chalk.yellow(`\n${planned.length} issue(s) will be created:`));
  for (const issue of planned) {
    console.log(chalk.gray(`  ${issue.title}`));
  }

  const answer = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'Create these issues?',
      default: false,
    },
  ]);

  if (answer.proceed) spinner.start('Creating issues...');
  return answer.proceed;
}

const program = new Command();

program
  .name('issue-porter')
  .description('Export issues from a GitHub repository and import them into another')
  .version('1.0.0');

program
  .command('export')
  .description('Export issues (and optionally pull requests) to a JSON file')
  .argument('<repo>', 'Repository URL, e.g. https://github.com/<owner>/<repo>')
  .option('-o, --outfile <path>', 'Output file (default: <repo>.json)')
  .option('-p, --pull-requests', 'Also export pull requests')
  .option('-c, --ignore-closed', "Don't export closed issues or pull requests")
  .option('-t, --token <token>', 'GitHub token (default: GITHUB_TOKEN)')
  .option('-v, --verbose', 'Show more info, useful for debugging')
  .action(async (repo: string, options: ExportCommandOptions) => {
    const verbose = Boolean(options.verbose);
    const spinner = ora('Exporting issues...').start();

    try {
      const deps = setup(verbose, spinner, options.token);
      const result = await runExport(
        {
          repo,
          outfile: options.outfile,
          includePullRequests: options.pullRequests,
          ignoreClosed: options.ignoreClosed,
        },
        deps
      );

      if (result.written) spinner.succeed('Export complete');
      else spinner.warn('Nothing to export');

      printExportResult(result);
    } catch (error: unknown) {
      fail(spinner, 'Export failed', error, verbose);
    }
  });

program
  .command('import')
  .description('Create issues from a file that are missing in a repository')
  .argument('<repo>', 'Repository URL, e.g. https://github.com/<owner>/<repo>')
  .argument('<issues_file>', 'JSON file produced by export, or a JSON array of issues')
  .argument('[token]', 'GitHub token (default: GITHUB_TOKEN)')
  .option('-d, --delete-issues', 'Delete remote issues missing from the file (not supported yet)')
  .option('-c, --ignore-closed', "Don't import closed issues")
  .option('--dry-run', 'Show which issues would be created without creating them')
  .option('-y, --yes', 'Create issues without asking for confirmation')
  .option('-v, --verbose', 'Show more info, useful for debugging')
  .action(async (repo: string, issuesFile: string, token: string | undefined, options: ImportCommandOptions) => {
    const verbose = Boolean(options.verbose);
    const spinner = ora('Comparing issues...').start();

    try {
      const deps = setup(verbose, spinner, token);
      const askFirst = !options.yes && !options.dryRun && Boolean(process.stdin.isTTY);

      const result = await runImport(
        {
          repo,
          issuesFile,
          token: token ?? deps.config.token ?? '',
          deleteIssues: options.deleteIssues,
          ignoreClosed: options.ignoreClosed,
          dryRun: options.dryRun,
          confirm: askFirst ? (planned) => confirmImport(spinner, planned) : undefined,
        },
        deps
      );

      if (result.aborted) spinner.stop();
      else spinner.succeed(result.dryRun ? 'Preview complete' : 'Import complete');

      if (verbose || result.dryRun) printNearMatches(result.nearMatches);
      printImportResult(result);
    } catch (error: unknown) {
      fail(spinner, 'Import failed', error, verbose);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
