/**
 * block-users: block every login read from stdin.
 */

import { Command } from 'commander';
import { assertNeverStatus, blockUser, collect, getBlocks, type BlockStatus, type Logger } from '@octoblock/core';
import { createCommandContext, type CliDeps, type CommandContext } from '../lib/context.js';
import { parseUsernames } from '../lib/csv.js';

export interface BlockUsersOptions {
  org?: string;
  force?: boolean;
}

export type BlockUsersSummary = Record<BlockStatus['kind'] | 'skipped', number>;

function reportStatus(logger: Logger, username: string, status: BlockStatus): void {
  switch (status.kind) {
    case 'newly-blocked':
      logger.info(`Successfully blocked ${username}`);
      return;
    case 'already-blocked':
      logger.warn(`${username} was already blocked`);
      return;
    case 'user-not-found':
      logger.warn(`${username} was not found`);
      return;
    case 'other-success':
      logger.error(`Unknown success status code: ${status.status}`);
      return;
    case 'other-non-success':
      logger.error(`Unknown non-success message: ${status.message}`);
      return;
    default:
      assertNeverStatus(status);
  }
}

/**
 * Blocks are issued one at a time, in input order. Unless `force` is set,
 * logins already on the block list are skipped without a request.
 */
export async function blockUsers(
  ctx: CommandContext,
  usernames: string[],
  options: BlockUsersOptions,
): Promise<BlockUsersSummary> {
  const { transport, logger, config } = ctx;
  const summary: BlockUsersSummary = {
    'newly-blocked': 0,
    'already-blocked': 0,
    'user-not-found': 0,
    'other-success': 0,
    'other-non-success': 0,
    skipped: 0,
  };

  let pending = usernames;
  if (!options.force) {
    const known = new Set(
      (await collect(getBlocks(transport, options.org, { pageSize: config.pageSize }))).map((user) =>
        user.login.toLowerCase(),
      ),
    );
    pending = usernames.filter((username) => !known.has(username.toLowerCase()));
    summary.skipped = usernames.length - pending.length;
    logger.warn(`Skipping ${summary.skipped} known blocked users`);
  }

  for (const username of pending) {
    const status = await blockUser(transport, username, options.org);
    summary[status.kind] += 1;
    reportStatus(logger, username, status);
  }

  return summary;
}

export function registerBlockUsersCommand(program: Command, deps: CliDeps): void {
  program
    .command('block-users')
    .description('Block a list of users provided in CSV format on stdin (first column)')
    .option('--org <org>', 'Block from this organization instead of the authenticated user')
    .option('--force', 'Send block requests for every account (skip checking the current block list)')
    .action(async (options: BlockUsersOptions, command: Command) => {
      const ctx = createCommandContext(command, deps);
      const usernames = parseUsernames(await ctx.readInput());
      ctx.logger.debug(`Read ${usernames.length} usernames from input`);

      const summary = await blockUsers(ctx, usernames, options);
      ctx.logger.debug('Block summary', summary);
    });
}
