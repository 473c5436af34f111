/**
 * Terminal output for export and import runs
 */

import chalk from 'chalk';
import { diffLines } from 'diff';
import { ExportResult, ImportResult, Issue, NearMatch } from './types';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';
const CONTEXT_LINES = 2;

export interface DiffLine {
  type: 'added' | 'removed' | 'context';
  text: string;
}

function splitLines(value: string): string[] {
  const lines = value.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Line diff from the remote body to the local body, with a little context
 * around each change. Unchanged stretches beyond the context are dropped.
 */
export function bodyDiff(remoteBody: string | null, localBody: string | null): DiffLine[] {
  const parts = diffLines((remoteBody ?? '').trim() + '\n', (localBody ?? '').trim() + '\n');
  const lines: DiffLine[] = [];

  parts.forEach((part, index) => {
    const partLines = splitLines(part.value);

    if (part.added || part.removed) {
      const type = part.added ? 'added' : 'removed';
      partLines.forEach((text) => lines.push({ type, text }));
      return;
    }

    const hasPrevious = index > 0;
    const hasNext = index < parts.length - 1;
    let kept: string[] = [];

    if (hasPrevious && hasNext) {
      kept =
        partLines.length <= CONTEXT_LINES * 2
          ? partLines
          : [...partLines.slice(0, CONTEXT_LINES), ...partLines.slice(-CONTEXT_LINES)];
    } else if (hasPrevious) {
      kept = partLines.slice(0, CONTEXT_LINES);
    } else if (hasNext) {
      kept = partLines.slice(-CONTEXT_LINES);
    }

    kept.forEach((text) => lines.push({ type: 'context', text }));
  });

  return lines;
}

function printDiffLine(line: DiffLine): void {
  if (line.type === 'added') console.log(chalk.green(`  + ${line.text}`));
  else if (line.type === 'removed') console.log(chalk.red(`  - ${line.text}`));
  else console.log(chalk.gray(`    ${line.text}`));
}

export function printNearMatches(matches: readonly NearMatch[]): void {
  for (const match of matches) {
    const number = match.remote.number === null ? '' : ` #${match.remote.number}`;
    console.log(chalk.bold(`\n"${match.local.title}" (remote${number} has a different body):`));
    bodyDiff(match.remote.body, match.local.body).forEach(printDiffLine);
  }
  if (matches.length > 0) console.log();
}

function printIssueList(issues: readonly Issue[]): void {
  for (const issue of issues) {
    const labels = issue.labels.length > 0 ? chalk.gray(` [${issue.labels.join(', ')}]`) : '';
    console.log(`  ${issue.title}${labels}`);
  }
}

export function printExportResult(result: ExportResult): void {
  console.log(chalk.bold(`\n${RULE}`));
  console.log(chalk.bold.cyan('Export Results'));
  console.log(chalk.bold(`${RULE}\n`));

  if (!result.written) {
    console.log(chalk.yellow('⊘ Nothing exported, no file written'));
    console.log();
    return;
  }

  console.log(chalk.green(`✓ Issues: ${result.issues}`));
  if (result.pullRequests !== null) {
    console.log(chalk.green(`✓ Pull requests: ${result.pullRequests}`));
  }
  console.log(chalk.gray(`  → ${result.outfile}`));
  console.log();
}

export function printImportResult(result: ImportResult): void {
  console.log(chalk.bold(`\n${RULE}`));
  console.log(chalk.bold.cyan(result.dryRun ? 'Import Preview' : 'Import Results'));
  console.log(chalk.bold(`${RULE}\n`));

  console.log(chalk.gray(`Local issues: ${result.local}, remote issues: ${result.remote}`));

  if (result.planned.length === 0) {
    console.log(chalk.green('✓ Everything is already imported'));
    console.log();
    return;
  }

  if (result.dryRun) {
    console.log(chalk.yellow(`${result.planned.length} issue(s) would be created:`));
    printIssueList(result.planned);
  } else if (result.aborted) {
    console.log(chalk.yellow(`⊘ Cancelled, ${result.planned.length} issue(s) not created`));
  } else {
    console.log(chalk.green(`✓ Created ${result.created.length} issue(s):`));
    for (const item of result.created) {
      const number = item.number === null ? '' : `#${item.number} `;
      console.log(chalk.gray(`  ${number}${item.title}`));
    }
  }

  console.log();
}
