/**
 * Environment-driven settings
 */

import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { ConfigError } from './errors';

export const configKeys = {
  GITHUB_TOKEN: 'GITHUB_TOKEN',
  GITHUB_WEB_URL: 'GITHUB_WEB_URL',
  GITHUB_API_URL: 'GITHUB_API_URL',
  GITHUB_API_VERSION: 'GITHUB_API_VERSION',
  TIMEOUT_MS: 'ISSUE_PORTER_TIMEOUT_MS',
  PER_PAGE: 'ISSUE_PORTER_PER_PAGE',
} as const;

const trimToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const envSchema = z.object({
  [configKeys.GITHUB_TOKEN]: z.preprocess(trimToUndefined, z.string().trim().min(1)).optional(),
  [configKeys.GITHUB_WEB_URL]: z.preprocess(trimToUndefined, z.string().trim().url().default('https://github.com/')),
  [configKeys.GITHUB_API_URL]: z.preprocess(trimToUndefined, z.string().trim().url().default('https://api.github.com')),
  [configKeys.GITHUB_API_VERSION]: z.preprocess(trimToUndefined, z.string().trim().min(1).default('2022-11-28')),
  [configKeys.TIMEOUT_MS]: z.preprocess(
    trimToUndefined,
    z.coerce.number().int().positive('must be a positive integer').default(30000)
  ),
  [configKeys.PER_PAGE]: z.preprocess(
    trimToUndefined,
    z.coerce
      .number()
      .int()
      .min(1, 'must be between 1 and 100')
      .max(100, 'must be between 1 and 100')
      .default(100)
  ),
});

export interface AppConfig {
  token?: string;
  /** Always ends with a slash */
  webBaseUrl: string;
  /** Never ends with a slash */
  apiBaseUrl: string;
  apiVersion: string;
  timeoutMs: number;
  perPage: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  webBaseUrl: 'https://github.com/',
  apiBaseUrl: 'https://api.github.com',
  apiVersion: '2022-11-28',
  timeoutMs: 30000,
  perPage: 100,
};

/**
 * Validate settings from the environment (process.env by default)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue: ZodIssue) => {
        const label = issue.path.length ? issue.path.join('.') : 'env';
        return `- ${label}: ${issue.message}`;
      })
      .join('\n');

    throw new ConfigError(details);
  }

  const data = parsed.data;
  const webBaseUrl = data[configKeys.GITHUB_WEB_URL];

  return {
    token: data[configKeys.GITHUB_TOKEN],
    webBaseUrl: webBaseUrl.endsWith('/') ? webBaseUrl : `${webBaseUrl}/`,
    apiBaseUrl: data[configKeys.GITHUB_API_URL].replace(/\/+$/, ''),
    apiVersion: data[configKeys.GITHUB_API_VERSION],
    timeoutMs: data[configKeys.TIMEOUT_MS],
    perPage: data[configKeys.PER_PAGE],
  };
}
