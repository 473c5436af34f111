/**
 * Export Bundle serialization and file I/O
 */

import fs from 'fs';
import { issueCodec, pullRequestCodec } from './entities';
import { InvalidFileFormatError, InvalidRecordError } from './errors';
import { EntityCodec, ExportBundle, IssueRecord, PullRequestRecord } from './types';

interface BundleDocument {
  issues: IssueRecord[];
  prs?: PullRequestRecord[];
}

export function serializeBundle(bundle: ExportBundle): string {
  const document: BundleDocument = {
    issues: bundle.issues.map((issue) => issueCodec.toRecord(issue)),
  };

  if (bundle.prs) {
    document.prs = bundle.prs.map((pr) => pullRequestCodec.toRecord(pr));
  }

  return JSON.stringify(document, null, 2) + '\n';
}

function parseRecords<T, R>(codec: EntityCodec<T, R>, records: unknown[], category: string, source: string): T[] {
  return records.map((record, index) => {
    try {
      return codec.parse(record);
    } catch (error: unknown) {
      if (error instanceof InvalidRecordError) {
        throw new InvalidFileFormatError(source, `${category}[${index}]: ${error.reason}`);
      }
      throw error;
    }
  });
}

/**
 * Parse an export document. A bare array is the older issues-only format.
 */
export function parseBundle(content: string, source = '<input>'): ExportBundle {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error: unknown) {
    throw new InvalidFileFormatError(source, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  if (Array.isArray(data)) {
    return { issues: parseRecords(issueCodec, data, 'issues', source) };
  }

  if (typeof data !== 'object' || data === null || !('issues' in data) || !Array.isArray(data.issues)) {
    throw new InvalidFileFormatError(source, 'expected an array of issues or an object with an "issues" array');
  }

  const bundle: ExportBundle = { issues: parseRecords(issueCodec, data.issues, 'issues', source) };

  if ('prs' in data && data.prs !== undefined) {
    if (!Array.isArray(data.prs)) {
      throw new InvalidFileFormatError(source, '"prs" must be an array');
    }
    bundle.prs = parseRecords(pullRequestCodec, data.prs, 'prs', source);
  }

  return bundle;
}

export function readBundleFile(filePath: string): ExportBundle {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new InvalidFileFormatError(filePath, error instanceof Error ? error.message : String(error));
  }
  return parseBundle(content, filePath);
}

export function writeBundleFile(filePath: string, bundle: ExportBundle): void {
  fs.writeFileSync(filePath, serializeBundle(bundle), 'utf-8');
}
