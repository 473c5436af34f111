/**
 * issue-porter - Programmatic API
 *
 * Export all functions, classes and types for programmatic usage
 */

export { runExport } from './lib/exporter';
export type { ExportDependencies } from './lib/exporter';
export { runImport } from './lib/importer';
export type { ImportDependencies } from './lib/importer';
export { GitHubClient } from './lib/github-client';
export { OctokitTransport } from './lib/http-transport';
export { fetchCollection, classifyResponse, parseNextLink } from './lib/paginated-fetcher';
export { isRepositoryUrl, parseOwnerAndRepo } from './lib/repo-locator';
export { issueCodec, pullRequestCodec, identityKey, issueCreationPayload, normalizeLabels } from './lib/entities';
export { parseBundle, serializeBundle, readBundleFile, writeBundleFile } from './lib/bundle';
export { computeMissing, findNearMatches } from './lib/reconcile';
export { loadConfig, DEFAULT_CONFIG } from './lib/config';
export type { AppConfig } from './lib/config';
export { createConsoleLogger, silentLogger } from './lib/logger';

export * from './lib/errors';
export * from './lib/types';
