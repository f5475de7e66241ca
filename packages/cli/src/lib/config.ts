/**
 * CLI configuration: flags first, then environment, then defaults.
 */

import { DEFAULT_API_BASE_URL, DEFAULT_PAGE_SIZE, DEFAULT_USER_INFO_CHUNK_SIZE } from '@octoblock/core';
import { exitCommandError } from './command-runtime.js';

export type Env = Record<string, string | undefined>;

export interface CliConfig {
  /** Personal access token; absent means anonymous requests. */
  token?: string;
  /** REST base URL (GitHub Enterprise installs use their own). */
  baseUrl: string;
  /** Items per page for paginated listings (1-100). */
  pageSize: number;
  /** Usernames per batched GraphQL profile query. */
  userInfoBatchSize: number;
  verbose: boolean;
  quiet: boolean;
}

export interface ConfigFlags {
  token?: string;
  verbose?: boolean;
  quiet?: boolean;
  batchSize?: string;
}

/** GitHub caps `per_page` at 100. */
const MAX_PAGE_SIZE = 100;

function parsePositiveInt(raw: string, name: string, max?: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max !== undefined ? ` between 1 and ${max}` : '';
    exitCommandError({ message: `${name} must be an integer${range}, got "${raw}"`, exitCode: 2 });
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

export function resolveConfig(flags: ConfigFlags, env: Env): CliConfig {
  const pageSizeRaw = nonEmpty(env.OCTOBLOCK_PAGE_SIZE);
  const batchSizeRaw = nonEmpty(flags.batchSize) ?? nonEmpty(env.OCTOBLOCK_BATCH_SIZE);

  return {
    token: nonEmpty(flags.token) ?? nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GH_TOKEN),
    baseUrl: nonEmpty(env.GITHUB_API_URL)?.replace(/\/+$/, '') ?? DEFAULT_API_BASE_URL,
    pageSize: pageSizeRaw ? parsePositiveInt(pageSizeRaw, 'OCTOBLOCK_PAGE_SIZE', MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE,
    userInfoBatchSize: batchSizeRaw ? parsePositiveInt(batchSizeRaw, 'batch size') : DEFAULT_USER_INFO_CHUNK_SIZE,
    verbose: flags.verbose ?? false,
    quiet: flags.quiet ?? false,
  };
}
