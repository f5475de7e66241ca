/**
 * check-follow: does one account follow another?
 */

import { Command } from 'commander';
import { checkFollow, getCurrentUser } from '@octoblock/core';
import { createCommandContext, type CliDeps, type CommandContext } from '../lib/context.js';

export interface CheckFollowOptions {
  /** The possibly followed account; defaults to the authenticated user. */
  user?: string;
  follower: string;
}

export async function runCheckFollow(ctx: CommandContext, options: CheckFollowOptions): Promise<boolean> {
  const target = options.user ?? (await getCurrentUser(ctx.transport)).login;
  ctx.logger.debug(`Checking whether ${options.follower} follows ${target}`);

  const follows = await checkFollow(ctx.transport, options.follower, target);
  ctx.stdout.write(`${follows}\n`);
  return follows;
}

export function registerCheckFollowCommand(program: Command, deps: CliDeps): void {
  program
    .command('check-follow')
    .description('Check whether one user follows another')
    .option('-u, --user <user>', 'The possibly followed user (default: the authenticated user)')
    .requiredOption('-f, --follower <follower>', 'The possible follower')
    .action(async (options: CheckFollowOptions, command: Command) => {
      await runCheckFollow(createCommandContext(command, deps), options);
    });
}
