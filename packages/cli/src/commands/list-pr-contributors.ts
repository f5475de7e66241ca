/**
 * list-pr-contributors: one CSV row per pull-request author of a repository.
 *
 * Columns: login, id, PR count. When the token is accepted, profile and
 * relationship columns follow: account age in days at the first PR, display
 * name, twitter handle (unless omitted), "you follow them", "they follow you".
 */

import { Command } from 'commander';
import {
  Exclusions,
  accountAgeInDays,
  collect,
  getFollowers,
  getFollowing,
  getUsersInfoChunked,
  parseRepoPath,
  probeAuthenticatedUser,
  pullRequests,
  summarizeContributors,
  type UserInfo,
} from '@octoblock/core';
import { createCommandContext, type CliDeps, type CommandContext } from '../lib/context.js';
import { exitCommandError } from '../lib/command-runtime.js';
import type { Field } from '../lib/csv.js';

export const DEFAULT_EXCLUSIONS_FILE = 'data/exclusions.csv';

export interface PrContributorsOptions {
  repoPath: string;
  omitTwitter?: boolean;
  exclusionsFile?: string;
  ignoreExclusions?: boolean;
}

interface AdditionalUserInfo {
  followsYou: Set<string>;
  youFollow: Set<string>;
  /** Keyed by lowercased login. */
  userInfo: Map<string, UserInfo>;
}

async function loadAdditionalUserInfo(ctx: CommandContext, usernames: string[]): Promise<AdditionalUserInfo> {
  const { transport, logger, config } = ctx;
  const streamOptions = { pageSize: config.pageSize };
  const logins = async (source: AsyncIterable<{ login: string }>) =>
    new Set((await collect(source)).map((user) => user.login.toLowerCase()));

  logger.info('Loading follower and following information');
  const [followsYou, youFollow] = await Promise.all([
    logins(getFollowers(transport, streamOptions)),
    logins(getFollowing(transport, streamOptions)),
  ]);

  logger.info(`Loading additional user information for ${usernames.length} users`);
  const userInfo = new Map<string, UserInfo>();
  for await (const info of getUsersInfoChunked(transport, usernames, config.userInfoBatchSize)) {
    userInfo.set(info.login.toLowerCase(), info);
  }

  return { followsYou, youFollow, userInfo };
}

export async function listPrContributors(ctx: CommandContext, options: PrContributorsOptions): Promise<void> {
  const { transport, logger, config, sink } = ctx;

  const parsed = parseRepoPath(options.repoPath);
  if (!parsed) {
    exitCommandError({ message: `Invalid repository path: ${options.repoPath}`, exitCode: 2 });
  }

  const exclusions = options.ignoreExclusions
    ? Exclusions.empty()
    : Exclusions.fromFile(options.exclusionsFile ?? DEFAULT_EXCLUSIONS_FILE);

  logger.info('Loading pull requests');
  const prs = await collect(pullRequests(transport, parsed.owner, parsed.repo, { pageSize: config.pageSize }));
  const contributors = summarizeContributors(prs);
  logger.debug(`Loaded ${prs.length} pull requests from ${contributors.length} contributors`);

  // Profile and relationship data need an accepted token
  const me = await probeAuthenticatedUser(transport);
  const additional = me
    ? await loadAdditionalUserInfo(ctx, contributors.map((c) => c.login))
    : null;
  if (!me) {
    logger.debug('Not authenticated; writing basic columns only');
  }

  for (const contributor of contributors) {
    if (exclusions.isExcluded(options.repoPath, contributor.login)) {
      logger.warn(`Excluded user ${contributor.login}`);
      continue;
    }

    const record: Field[] = [contributor.login, contributor.id, contributor.prCount];

    if (additional) {
      const key = contributor.login.toLowerCase();
      const info = additional.userInfo.get(key);
      // Accounts such as bots have no profile in the user query
      const age = info ? accountAgeInDays(contributor.firstPrAt, new Date(info.createdAt)) : -1;

      record.push(age, info?.name ?? '');
      if (!options.omitTwitter) {
        record.push(info?.twitterUsername ?? '');
      }
      record.push(additional.youFollow.has(key), additional.followsYou.has(key));
    }

    sink.writeRow(record);
  }
}

export function registerListPrContributorsCommand(program: Command, deps: CliDeps): void {
  program
    .command('list-pr-contributors')
    .description('List pull-request contributors for a repository in CSV format')
    .requiredOption('-r, --repo-path <owner/repo>', 'The repository to check for pull requests')
    .option('--omit-twitter', 'Omit the twitter handle column (it is not verified)')
    .option('-e, --exclusions-file <file>', 'Exclusions file', DEFAULT_EXCLUSIONS_FILE)
    .option('--ignore-exclusions', 'Ignore the exclusions file')
    .option('--batch-size <n>', 'Usernames per profile query')
    .action(async (options: PrContributorsOptions & { batchSize?: string }, command: Command) => {
      const ctx = createCommandContext(command, deps, { batchSize: options.batchSize });
      await listPrContributors(ctx, options);
    });
}
