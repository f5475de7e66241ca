import { Command } from 'commander';
import { registerBlockUsersCommand } from './commands/block-users.js';
import { registerListUsersCommands } from './commands/list-users.js';
import { registerListPrContributorsCommand } from './commands/list-pr-contributors.js';
import { registerCheckFollowCommand } from './commands/check-follow.js';
import { defaultDeps, type CliDeps } from './lib/context.js';

export const VERSION = '0.1.0';

export function createProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();

  program
    .name('octoblock')
    .description('Block accounts, list followers and blocks, and report pull-request contributors on GitHub')
    .version(VERSION)
    .option('-t, --token <token>', 'GitHub personal access token (default: $GITHUB_TOKEN or $GH_TOKEN)')
    .option('-v, --verbose', 'Debug logging')
    .option('-q, --quiet', 'Only log warnings and errors');

  registerBlockUsersCommand(program, deps);
  registerListUsersCommands(program, deps);
  registerListPrContributorsCommand(program, deps);
  registerCheckFollowCommand(program, deps);

  return program;
}
