/**
 * Account listings: list-followers, list-following, list-blocks.
 * Each writes one `login,id` row per account to stdout.
 */

import { Command } from 'commander';
import { getBlocks, getFollowers, getFollowing, type User } from '@octoblock/core';
import { createCommandContext, type CliDeps } from '../lib/context.js';
import type { CsvSink } from '../lib/csv.js';

export async function writeUsers(users: AsyncIterable<User>, sink: CsvSink): Promise<number> {
  let count = 0;
  for await (const user of users) {
    sink.writeRow([user.login, user.id]);
    count++;
  }
  return count;
}

export function registerListUsersCommands(program: Command, deps: CliDeps): void {
  program
    .command('list-followers')
    .description("List the authenticated user's followers in CSV format")
    .action(async (_options: Record<string, never>, command: Command) => {
      const ctx = createCommandContext(command, deps);
      const count = await writeUsers(getFollowers(ctx.transport, { pageSize: ctx.config.pageSize }), ctx.sink);
      ctx.logger.debug(`Listed ${count} followers`);
    });

  program
    .command('list-following')
    .description('List accounts the authenticated user follows in CSV format')
    .action(async (_options: Record<string, never>, command: Command) => {
      const ctx = createCommandContext(command, deps);
      const count = await writeUsers(getFollowing(ctx.transport, { pageSize: ctx.config.pageSize }), ctx.sink);
      ctx.logger.debug(`Listed ${count} followed accounts`);
    });

  program
    .command('list-blocks')
    .description('List blocked accounts in CSV format')
    .option('--org <org>', 'List blocks of this organization instead of the authenticated user')
    .action(async (options: { org?: string }, command: Command) => {
      const ctx = createCommandContext(command, deps);
      const count = await writeUsers(getBlocks(ctx.transport, options.org, { pageSize: ctx.config.pageSize }), ctx.sink);
      ctx.logger.debug(`Listed ${count} blocked accounts`);
    });
}
