/**
 * @octoblock/cli
 *
 * octoblock command-line interface.
 *
 *   octoblock list-followers > followers.csv
 *   octoblock block-users --org acme < spammers.csv
 *   octoblock list-pr-contributors -r acme/widgets
 *
 * The CLI entry point is src/bin/octoblock.ts
 */

export { createProgram, VERSION } from './program.js';
export { defaultDeps } from './lib/context.js';
export type { CliDeps, CommandContext } from './lib/context.js';
